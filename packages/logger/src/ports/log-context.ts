export type LogContext = {
  component: string
  engine: string

  tree: string
  trees: readonly string[]
  operation: string

  attempt: number
  attempts: number

  bytes: number
  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
