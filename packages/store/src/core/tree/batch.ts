import type { RawBatchOp } from "@kvtree/engine"
import { UsageError } from "@kvtree/errors"
import type { EntryCodec } from "../../ports/entry-codec"

export type BatchDeps<K, V> = {
  keyCodec: EntryCodec<K>
  valueCodec: EntryCodec<V>
}

/**
 * Staged inserts and removes. Staging encodes and throws `EncodeError` right
 * there; applying a batch never fails for encoding reasons.
 */
export class Batch<K, V> {
  private readonly ops: RawBatchOp[] = []
  private consumed = false

  constructor(private readonly deps: BatchDeps<K, V>) {}

  insert(key: K, value: V): void {
    this.ensureUnconsumed()

    const encodedKey = this.deps.keyCodec.encode(key)
    const encodedValue = this.deps.valueCodec.encode(value)

    this.ops.push({ kind: "insert", key: encodedKey, value: encodedValue })
  }

  remove(key: K): void {
    this.ensureUnconsumed()

    this.ops.push({ kind: "remove", key: this.deps.keyCodec.encode(key) })
  }

  get size(): number {
    return this.ops.length
  }

  get isConsumed(): boolean {
    return this.consumed
  }

  clear(): void {
    this.ensureUnconsumed()
    this.ops.length = 0
  }

  /**
   * Staged operations in insertion order.
   * @internal
   */
  operations(): readonly RawBatchOp[] {
    this.ensureUnconsumed()

    return [...this.ops]
  }

  /** @internal */
  markConsumed(): void {
    this.consumed = true
  }

  private ensureUnconsumed(): void {
    if (this.consumed) {
      throw new UsageError("Batch was already applied")
    }
  }
}
