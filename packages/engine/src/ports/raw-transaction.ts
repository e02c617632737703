import type { RawBatchOp, RawBytes } from "./raw-bytes"
import type { RawTree } from "./raw-tree"

export type RawCommitOutcome = { readonly kind: "committed" } | { readonly kind: "conflict" }

/**
 * One tree as seen from inside a transaction attempt. Reads observe the
 * attempt's own staged writes.
 */
export interface RawTransactionalTree {
  readonly name: string

  get(key: RawBytes): RawBytes | undefined
  insert(key: RawBytes, value: RawBytes): RawBytes | undefined
  remove(key: RawBytes): RawBytes | undefined
  applyBatch(ops: readonly RawBatchOp[]): void
}

/**
 * A single transaction attempt over a fixed set of trees.
 *
 * @remarks
 * An attempt ends with `commit()` or `rollback()`. Once ended, every
 * operation except `rollback()` throws a `UsageError`; `rollback()` becomes
 * a no-op. A `conflict` outcome ends the attempt without applying anything.
 */
export interface RawTransaction {
  readonly active: boolean

  /**
   * The transactional side of `tree`. Throws a `StorageError` when `tree`
   * does not take part in this transaction.
   */
  treeFor(tree: RawTree): RawTransactionalTree

  commit(): RawCommitOutcome
  rollback(): void

  generateId(): number

  /**
   * Requests a flush once the attempt commits. Never waits for it.
   */
  scheduleFlush(): void
}
