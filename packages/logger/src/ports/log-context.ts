/**
 * Well-known fields attached to configuration log entries.
 */
export type LogContext = {
  service: string
  component: string

  /** Property source name, e.g. "env" or "json:app.json" */
  source: string
  /** Dotted configuration key */
  key: string
  file: string
  profile: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Partial overlay merged into a logger's context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
