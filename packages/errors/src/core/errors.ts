import type { ErrorContext } from "../ports/error"
import { BaseError } from "./base-error"

type ErrorOptions = Readonly<{
  context?: ErrorContext
  cause?: unknown
}>

/**
 * Engine-level failure: I/O, corruption, capacity, a closed engine or a
 * dropped tree.
 */
export class StorageError extends BaseError<"storage"> {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, { code: "storage", ...options })
  }
}

/**
 * Bytes could not be decoded as the expected type: truncated, malformed, or
 * written for a different type.
 */
export class DecodeError extends BaseError<"decode"> {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, { code: "decode", ...options })
  }
}

/**
 * Value has no representation under the fixed codec configuration.
 */
export class EncodeError extends BaseError<"encode"> {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, { code: "encode", ...options })
  }
}

/**
 * A concurrent transaction touched the same keys.
 *
 * @remarks
 * Engines throw it from inside an attempt to request a re-run; the transaction
 * runner only lets it escape once a configured retry limit is exhausted.
 */
export class TransactionConflictError extends BaseError<"transaction_conflict"> {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, { code: "transaction_conflict", isRetryable: true, ...options })
  }
}

/**
 * A transactional mutation could not encode its key or value. Ends the attempt
 * without going through the abort path and is never retried.
 */
export class UnabortableTransactionError extends BaseError<"unabortable_transaction"> {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, { code: "unabortable_transaction", isOperational: false, ...options })
  }
}

/**
 * A handle was used outside its lifetime or with arguments it cannot accept.
 */
export class UsageError extends BaseError<"usage"> {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, { code: "usage", isOperational: false, ...options })
  }
}

export type StoreError =
  | StorageError
  | DecodeError
  | EncodeError
  | TransactionConflictError
  | UnabortableTransactionError
  | UsageError
