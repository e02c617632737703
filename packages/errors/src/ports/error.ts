export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to errors: tree names, byte lengths, attempt
 * counters. Kept out of the message so log processors can index it.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface StoreErrorShape extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Structured metadata for debugging */
  readonly context: ErrorContext

  /** `true` if running the same operation again might succeed */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (bad bytes, full tree, closed engine),
   * `false` for misuse of the API or a broken invariant.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * Serialized error shape for logs. JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
