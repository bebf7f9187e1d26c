import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /**
   * Minimum level to emit.
   * @default "info"
   */
  level: LogLevelName

  /**
   * Human-readable lines instead of JSON. Meant for local development.
   */
  prettify?: boolean
}
