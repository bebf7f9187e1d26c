import type { AppError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && Number.isFinite(v.valueOf())
}

/**
 * Structural check for {@link AppError}.
 *
 * Works across duplicated package copies, where `instanceof BaseError` would not.
 */
export function isAppError(e: unknown): e is AppError {
  if (!isRecord(e)) return false

  return (
    typeof e.code === "string" &&
    isRecord(e.context) &&
    typeof e.isRetryable === "boolean" &&
    typeof e.isOperational === "boolean" &&
    isValidDate(e.timestamp) &&
    typeof e.message === "string" &&
    typeof e.name === "string"
  )
}
