export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]

/**
 * Numeric severities, higher = more severe. Matches pino's numbering.
 */
export const LogLevels = {
  Trace: 10,
  Debug: 20,
  Info: 30,
  Warn: 40,
  Error: 50,
  Fatal: 60,
} as const

export type LogLevel = (typeof LogLevels)[keyof typeof LogLevels]
