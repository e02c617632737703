export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define policy: which levels are emitted and whether
 * output is rendered for humans. Adapters decide how to honor them.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   */
  level: LogLevelName

  /**
   * Pretty-print output for local development. Structured JSON otherwise.
   */
  prettify?: boolean
}
