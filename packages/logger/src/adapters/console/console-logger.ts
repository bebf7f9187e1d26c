import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import { type LogLevelName, LogLevels } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

type ConsoleMethod = "debug" | "info" | "warn" | "error"

export type ConsoleWriter = Pick<Console, ConsoleMethod>

export type ConsoleLoggerDeps = {
  console?: ConsoleWriter
}

const LEVEL_TO_CONSOLE_METHOD: Record<LogLevelName, ConsoleMethod> = {
  trace: "debug",
  debug: "debug",
  info: "info",
  warn: "warn",
  error: "error",
  fatal: "error",
}

const LEVEL_SEVERITY: Record<LogLevelName, number> = {
  trace: LogLevels.Trace,
  debug: LogLevels.Debug,
  info: LogLevels.Info,
  warn: LogLevels.Warn,
  error: LogLevels.Error,
  fatal: LogLevels.Fatal,
}

const RESERVED = new Set(["timestamp", "level", "message"])

/**
 * Writes one line per entry to a console: JSON by default, `<time> <LEVEL> <message> {...}`
 * when `prettify` is set.
 */
export class ConsoleLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  private readonly sink: ConsoleWriter
  private readonly context: Record<string, unknown>

  constructor(
    private readonly deps: ConsoleLoggerDeps = {},
    private readonly opts: Partial<LoggerOptions> = {},
    context: LogContextPatch = {},
  ) {
    this.sink = deps.console ?? globalThis.console
    this.context = stripUndefined(context)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new ConsoleLogger<TContext & U>(this.deps, this.opts, {
      ...this.context,
      ...stripUndefined(context),
    })
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.write("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.write("debug", message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.write("info", message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.write("warn", message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.write("error", message, meta)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.write("fatal", message, meta)
  }

  private shouldLog(level: LogLevelName): boolean {
    const min = this.opts.level ?? "info"

    return LEVEL_SEVERITY[level] >= LEVEL_SEVERITY[min]
  }

  private write(level: LogLevelName, message: string, meta?: LogMeta<TContext>): void {
    if (!this.shouldLog(level)) return

    const extra: Record<string, unknown> = {}
    for (const [k, v] of Object.entries({ ...this.context, ...meta })) {
      if (v !== undefined && !RESERVED.has(k)) extra[k] = v
    }

    if ("err" in extra) extra.err = normalizeError(extra.err)

    const output = this.opts.prettify
      ? formatPretty(level, message, extra)
      : safeStringify({ timestamp: new Date().toISOString(), level, message, ...extra })

    this.sink[LEVEL_TO_CONSOLE_METHOD[level]](output)
  }
}

function normalizeError(err: unknown): unknown {
  if (!(err instanceof Error)) return err

  return {
    name: err.name,
    message: err.message,
    stack: err.stack,
    ...("code" in err && { code: err.code }),
    ...(err.cause !== undefined && { cause: normalizeError(err.cause) }),
  }
}

function stripUndefined(obj: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  for (const [k, v] of Object.entries(obj)) {
    if (v !== undefined) out[k] = v
  }
  return out
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value)
  } catch {
    return JSON.stringify({ message: "Failed to stringify log payload" })
  }
}

function formatPretty(
  level: LogLevelName,
  message: string,
  extra: Record<string, unknown>,
): string {
  const tail = Object.keys(extra).length ? ` ${safeStringify(extra)}` : ""

  return `${new Date().toISOString()} ${level.toUpperCase()} ${message}${tail}`
}

export function createConsoleLogger<TContext extends LogContext = LogContext>(
  deps: ConsoleLoggerDeps = {},
  opts: Partial<LoggerOptions> = {},
): Logger<TContext> {
  return new ConsoleLogger<TContext>(deps, opts)
}
