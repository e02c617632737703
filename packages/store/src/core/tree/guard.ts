import { toStorageError } from "@kvtree/errors"

/**
 * Runs an engine call, normalizing foreign failures into `StorageError`.
 */
export function guard<T>(tree: string, operation: string, fn: () => T): T {
  try {
    return fn()
  } catch (err) {
    throw toStorageError(err, { tree, operation })
  }
}
