import type { RawBatchOp, RawBytes, RawEntry, RawRange } from "./raw-bytes"
import type { RawCursor } from "./raw-cursor"

/**
 * A named, ordered byte-to-byte map inside an engine.
 *
 * @remarks
 * Implementations copy the bytes they retain and hand out bytes the caller
 * owns: writing into a returned array never changes what is stored.
 *
 * Every operation throws a `StorageError` once the tree was dropped or its
 * engine closed.
 */
export interface RawTree {
  readonly name: string

  get(key: RawBytes): RawBytes | undefined

  /**
   * Stores `value` under `key` and returns the value it replaced.
   */
  insert(key: RawBytes, value: RawBytes): RawBytes | undefined

  /**
   * Removes `key` and returns the value it held. Absent keys are a no-op.
   */
  remove(key: RawBytes): RawBytes | undefined

  containsKey(key: RawBytes): boolean

  first(): RawEntry | undefined
  last(): RawEntry | undefined

  range(range: RawRange): RawCursor
  scanPrefix(prefix: RawBytes): RawCursor

  /**
   * Applies every operation or none of them.
   */
  applyBatch(ops: readonly RawBatchOp[]): void

  popMin(): RawEntry | undefined
  popMax(): RawEntry | undefined

  len(): number
  isEmpty(): boolean
  clear(): void
}
