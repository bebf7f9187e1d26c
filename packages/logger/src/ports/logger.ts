import type { LogContext, LogContextPatch, LogMeta } from "./log-context"

export interface Logger<TContext extends LogContext = LogContext> {
  trace(message: string, meta?: LogMeta<TContext>): void
  debug(message: string, meta?: LogMeta<TContext>): void
  info(message: string, meta?: LogMeta<TContext>): void
  warn(message: string, meta?: LogMeta<TContext>): void
  error(message: string, meta?: LogMeta<TContext>): void
  fatal(message: string, meta?: LogMeta<TContext>): void

  /**
   * Returns a logger whose entries carry the parent's context plus `context`.
   * Keys in `context` win over the parent's; the parent is left unchanged.
   */
  child<U extends LogContextPatch>(context: U): Logger<TContext & U>
}
