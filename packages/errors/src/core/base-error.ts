import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../ports/error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable: boolean
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })

    this.name = new.target.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    Error.captureStackTrace?.(this, new.target)
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

/**
 * Serialize any thrown value to a {@link SerializedError}.
 *
 * BaseError keeps its code and context. Other errors get code "unknown" and are
 * non-operational; anything else lands under `context.value`. A cause already
 * seen higher up the chain ends it.
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  return serialize(err, options?.includeStack ?? false, new WeakSet())
}

function serialize(err: unknown, includeStack: boolean, seen: WeakSet<Error>): SerializedError {
  if (!(err instanceof Error)) {
    return {
      name: "NonErrorThrown",
      code: "unknown",
      message: typeof err === "string" ? err : "Unknown error",
      context: { value: err },
      isOperational: false,
      timestamp: new Date().toISOString(),
    }
  }

  seen.add(err)

  const app = err instanceof BaseError ? err : undefined
  const cause = err.cause instanceof Error && seen.has(err.cause) ? undefined : err.cause

  return {
    name: err.name,
    code: app?.code ?? "unknown",
    message: err.message,
    context: app ? { ...app.context } : {},
    isOperational: app?.isOperational ?? false,
    timestamp: (app?.timestamp ?? new Date()).toISOString(),
    ...(cause !== undefined && { cause: serialize(cause, includeStack, seen) }),
    ...(includeStack && err.stack ? { stack: err.stack } : {}),
  }
}
