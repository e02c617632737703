export { BaseError, type BaseErrorOptions, serializeError } from "./core/base-error"
export {
  DecodeError,
  EncodeError,
  StorageError,
  type StoreError,
  TransactionConflictError,
  UnabortableTransactionError,
  UsageError,
} from "./core/errors"
export { isStoreError } from "./core/utils/is-store-error"
export { toStorageError } from "./core/utils/to-storage-error"
export type { ErrorCode, ErrorContext, SerializedError, StoreErrorShape } from "./ports/error"
