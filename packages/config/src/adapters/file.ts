import fs from "node:fs/promises"
import path from "node:path"
import { SourceLoadError } from "../core/errors"

/**
 * Options shared by the file loaders.
 */
export type FileSourceOptions = {
  /**
   * Path to the file. Can be absolute or relative to `cwd`.
   *
   * @example ".env", ".env.production", "./config/app.json"
   */
  file: string

  /**
   * Whether the file must exist.
   *
   * - `true`: rejects with {@link SourceLoadError} if the file is not found.
   * - `false`: resolves to an empty source if the file is not found.
   */
  required: boolean

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

/**
 * Reads the file, or returns `undefined` when it is missing and optional.
 */
export async function readSourceFile(
  kind: string,
  opts: FileSourceOptions,
): Promise<string | undefined> {
  const filePath = path.resolve(opts.cwd ?? process.cwd(), opts.file)

  try {
    return await fs.readFile(filePath, "utf-8")
  } catch (err) {
    if (!opts.required && isNotFound(err)) return undefined
    throw new SourceLoadError(kind, opts.file, err)
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
