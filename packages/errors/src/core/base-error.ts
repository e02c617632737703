import type { ErrorCode, ErrorContext, SerializedError, StoreErrorShape } from "../ports/error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

export class BaseError<C extends ErrorCode = ErrorCode>
  extends Error
  implements StoreErrorShape
{
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable: boolean
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean

  /** Stop following `cause` after this many links. Default: 10 */
  maxDepth?: number
}>

/**
 * Serialize any thrown value to a consistent shape, following the `cause`
 * chain up to `maxDepth` links.
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  return serializeAt(err, options ?? {}, 0)
}

function serializeAt(err: unknown, options: SerializeOptions, depth: number): SerializedError {
  const includeStack = options.includeStack ?? false
  const maxDepth = options.maxDepth ?? 10

  const causeOf = (cause: unknown) =>
    cause !== undefined && depth < maxDepth
      ? { cause: serializeAt(cause, options, depth + 1) }
      : {}

  if (err instanceof BaseError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...causeOf(err.cause),
      ...(includeStack && err.stack !== undefined && { stack: err.stack }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      isOperational: false,
      timestamp: new Date().toISOString(),
      ...causeOf(err.cause),
      ...(includeStack && err.stack !== undefined && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}
