import {
  DecodeError,
  EncodeError,
  StorageError,
  type StoreError,
  TransactionConflictError,
  UnabortableTransactionError,
  UsageError,
} from "../errors"

/**
 * Type guard for the errors this library raises itself.
 *
 * @example
 * ```ts
 * try {
 *   tree.insert(key, value)
 * } catch (err) {
 *   if (isStoreError(err) && err.code === "encode") {
 *     // reject the input
 *   }
 * }
 * ```
 */
export function isStoreError(e: unknown): e is StoreError {
  return (
    e instanceof StorageError ||
    e instanceof DecodeError ||
    e instanceof EncodeError ||
    e instanceof TransactionConflictError ||
    e instanceof UnabortableTransactionError ||
    e instanceof UsageError
  )
}
