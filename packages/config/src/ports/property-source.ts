import type { Key } from "./key"

/**
 * A named provider of raw string values.
 *
 * Sources do no placeholder expansion and no type conversion; they answer
 * "what string, if any, is stored under this key".
 */
export interface PropertySource {
  /**
   * Human-readable name for debugging and provenance.
   * Example: "env", "dotenv:.env", "json:app.json", "overrides"
   */
  readonly name: string

  /**
   * Raw value stored under `key`, or `undefined` when not defined.
   *
   * Must be side-effect free. Static sources always give the same answer;
   * dynamic ones reflect current external state.
   */
  get(key: Key): string | undefined

  /**
   * Every key this source defines at or under `prefix`.
   * Sources that cannot enumerate return an empty array.
   */
  keys(prefix: Key): Key[]
}

/**
 * A value as read from a source, before placeholder expansion.
 */
export type RawProperty = {
  readonly key: Key
  readonly value: string
  /** Name of the source that provided the value */
  readonly source: string
}
