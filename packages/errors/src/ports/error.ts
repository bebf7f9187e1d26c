export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error (keys, offending values, source names).
 * Carried as data so callers never have to parse messages.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Stable, lowercase code for programmatic handling */
  readonly code: ErrorCode

  /** Frozen structured metadata */
  readonly context: ErrorContext

  /** `true` if repeating the same call might succeed */
  readonly isRetryable: boolean

  /**
   * `true` for expected failures caused by input (a missing key, a malformed value),
   * `false` for programmer errors and broken invariants.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape for logs and diagnostics output.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
