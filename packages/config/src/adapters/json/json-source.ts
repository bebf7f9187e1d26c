import { parse } from "lossless-json"
import { SourceLoadError } from "../../core/errors"
import { childKey, keyOf } from "../../core/key"
import type { Key } from "../../ports/key"
import { type FileSourceOptions, readSourceFile } from "../file"
import { MapSource } from "../map/map-source"

export type JsonSourceOptions = FileSourceOptions

/**
 * Load a JSON document into a static source named `json:<file>`.
 *
 * Nested objects become dotted keys and arrays become indices:
 * `{"db":{"hosts":["a","b"]}}` gives `db.hosts[0]=a`, `db.hosts[1]=b`.
 * Numbers keep their source digits (`9007199254740993`, `1e3`) and booleans are
 * stored as strings; `null` leaves are skipped.
 */
export async function loadJsonSource(opts: JsonSourceOptions): Promise<MapSource> {
  const name = `json:${opts.file}`
  const content = await readSourceFile("json", opts)

  if (content === undefined) return new MapSource(name)

  try {
    const document = parse(content, null, (digits) => digits)

    if (!isObject(document)) throw new TypeError("top-level value must be an object")

    return new MapSource(name, flatten(document, []))
  } catch (err) {
    throw new SourceLoadError("json", opts.file, err)
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function flatten(value: unknown, key: Key, out: [Key, string][] = []): [Key, string][] {
  if (value === null || value === undefined) return out

  if (Array.isArray(value)) {
    value.forEach((item, i) => flatten(item, childKey(key, i), out))
  } else if (isObject(value)) {
    for (const [name, item] of Object.entries(value)) {
      flatten(item, [...key, ...keyOf(name)], out)
    }
  } else {
    out.push([key, String(value)])
  }

  return out
}
