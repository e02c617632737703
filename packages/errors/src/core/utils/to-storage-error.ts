import type { ErrorContext } from "../../ports/error"
import { StorageError, type StoreError } from "../errors"
import { isStoreError } from "./is-store-error"

/**
 * Normalize a value thrown by an engine.
 *
 * - Errors from this library pass through unchanged
 * - Anything else becomes a StorageError carrying the original as `cause`
 */
export function toStorageError(err: unknown, context: ErrorContext = {}): StoreError {
  if (isStoreError(err)) {
    return err
  }

  const message =
    err instanceof Error ? err.message : typeof err === "string" ? err : "Unknown engine failure"

  return new StorageError(message, { cause: err, context })
}
