import { BaseError, type BaseErrorOptions, type ErrorContext } from "@stratum/errors"

export type ConfigErrorCode =
  | "invalid_key"
  | "not_found"
  | "circular_reference"
  | "parse_error"
  | "unknown_variant"
  | "missing_field"
  | "invalid_placeholder"
  | "source_load_failed"

/**
 * Common base of every error raised while building, resolving or mapping configuration.
 * None of them are retryable: the outcome only depends on the registered sources.
 */
export class ConfigError<C extends ConfigErrorCode = ConfigErrorCode> extends BaseError<C> {
  constructor(message: string, code: C, context: ErrorContext, cause?: unknown) {
    const options: BaseErrorOptions<C> = { code, context, cause, isRetryable: false }
    super(message, options)
  }
}

export class InvalidKeyError extends ConfigError<"invalid_key"> {
  constructor(key: string, reason: string) {
    super(`Invalid key "${key}": ${reason}`, "invalid_key", { key, reason })
  }
}

export class NotFoundError extends ConfigError<"not_found"> {
  constructor(readonly key: string) {
    super(`Property "${key}" not found`, "not_found", { key })
  }
}

export class CircularReferenceError extends ConfigError<"circular_reference"> {
  constructor(key: string, chain: readonly string[]) {
    super(
      `Circular reference while resolving "${key}": ${[...chain, key].join(" -> ")}`,
      "circular_reference",
      { key, chain: [...chain, key] },
    )
  }
}

export class ParseError extends ConfigError<"parse_error"> {
  constructor(key: string, value: string, type: string, cause?: unknown) {
    super(
      `Cannot parse "${value}" as ${type} at "${key}"`,
      "parse_error",
      { key, value, type },
      cause,
    )
  }
}

export class UnknownVariantError extends ConfigError<"unknown_variant"> {
  constructor(key: string, value: string, variants: readonly string[]) {
    super(
      `Unknown variant "${value}" at "${key}", expected one of: ${variants.join(", ")}`,
      "unknown_variant",
      { key, value, variants: [...variants] },
    )
  }
}

export class MissingFieldError extends ConfigError<"missing_field"> {
  constructor(key: string, field: string, description?: string, cause?: unknown) {
    const hint = description ? ` (${description})` : ""

    super(
      `Missing required field "${field}" at "${key}"${hint}`,
      "missing_field",
      { key, field, ...(description !== undefined && { description }) },
      cause,
    )
  }
}

export class InvalidPlaceholderError extends ConfigError<"invalid_placeholder"> {
  constructor(value: string, position: number, reason: string) {
    super(
      `Invalid placeholder in "${value}" at position ${position}: ${reason}`,
      "invalid_placeholder",
      { value, position, reason },
    )
  }
}

export class SourceLoadError extends ConfigError<"source_load_failed"> {
  constructor(source: string, file: string, cause?: unknown) {
    super(`Failed to load ${source} from "${file}"`, "source_load_failed", { source, file }, cause)
  }
}

export function isConfigError(err: unknown): err is ConfigError {
  return err instanceof ConfigError
}
