import { parse } from "dotenv"
import { InvalidKeyError, SourceLoadError } from "../../core/errors"
import { fromEnvVar, parseKey } from "../../core/key"
import type { Key } from "../../ports/key"
import { type FileSourceOptions, readSourceFile } from "../file"
import { MapSource } from "../map/map-source"

export type DotenvSourceOptions = FileSourceOptions

/**
 * Load a `.env` file into a static source named `dotenv:<file>`.
 *
 * Variable names follow the environment convention (`SERVER_PORT` → `server.port`);
 * names that are not env-var shaped are read as dotted keys (`server.port=8080`).
 */
export async function loadDotenvSource(opts: DotenvSourceOptions): Promise<MapSource> {
  const name = `dotenv:${opts.file}`
  const content = await readSourceFile("dotenv", opts)

  if (content === undefined) return new MapSource(name)

  const entries: [Key, string][] = []

  for (const [variable, value] of Object.entries(parse(content))) {
    try {
      entries.push([toKey(variable), value])
    } catch (err) {
      throw new SourceLoadError("dotenv", opts.file, err)
    }
  }

  return new MapSource(name, entries)
}

function toKey(variable: string): Key {
  try {
    return fromEnvVar(variable)
  } catch (err) {
    if (err instanceof InvalidKeyError) return parseKey(variable)
    throw err
  }
}
