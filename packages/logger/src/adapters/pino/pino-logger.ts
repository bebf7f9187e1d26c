import pino, {
  type DestinationStream,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type PinoLoggerDeps = {
  /**
   * Existing pino logger to derive from. When given, only `context` is bound
   * on top of it and `opts` are ignored.
   */
  base?: PinoLoggerBase

  /** Where to write JSON lines. Defaults to stdout. */
  destination?: DestinationStream
}

export class PinoLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  protected readonly logger: PinoLoggerBase

  constructor(
    protected readonly deps: Readonly<PinoLoggerDeps> = {},
    protected readonly opts: Partial<LoggerOptions> = {},
    context: LogContextPatch = {},
  ) {
    this.logger = this.init(context)
  }

  private init(context: LogContextPatch): PinoLoggerBase {
    if (this.deps.base) return this.deps.base.child(context)

    const pinoOpts: PinoOptions = {
      level: this.opts.level ?? "info",
      serializers: { err: errWithCause },
      ...(this.opts.prettify &&
        !this.deps.destination && {
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "HH:MM:ss.l",
              ignore: "pid,hostname",
            },
          },
        }),
    }

    const root = this.deps.destination ? pino(pinoOpts, this.deps.destination) : pino(pinoOpts)

    return root.child(context)
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.logger.trace(meta ?? {}, message)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.logger.debug(meta ?? {}, message)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.logger.info(meta ?? {}, message)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.logger.warn(meta ?? {}, message)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.logger.error(meta ?? {}, message)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.logger.fatal(meta ?? {}, message)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new PinoLogger<TContext & U>({ base: this.logger }, this.opts, context)
  }
}

export function createPinoLogger<TContext extends LogContext = LogContext>(
  deps: PinoLoggerDeps = {},
  opts: Partial<LoggerOptions> = {},
  context: LogContextPatch = {},
): Logger<TContext> {
  return new PinoLogger<TContext>(deps, opts, context)
}
