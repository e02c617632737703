import type { RawTransaction, RawTransactionalTree } from "@kvtree/engine"
import { EncodeError, UnabortableTransactionError, UsageError } from "@kvtree/errors"
import type { EntryCodec } from "../../ports/entry-codec"
import type { TreeResult } from "../../ports/tree-result"
import type { Batch } from "../tree/batch"
import { guard } from "../tree/guard"
import { ValueView } from "../views/views"

export type TransactionalTreeDeps<K, V> = {
  tx: RawTransaction
  raw: RawTransactionalTree
  keyCodec: EntryCodec<K>
  valueCodec: EntryCodec<V>
}

/**
 * A tree as seen by one transaction attempt. Reads observe the attempt's own
 * writes; nothing is visible outside until the attempt commits.
 *
 * @remarks
 * Valid only while its attempt runs. A key or value that cannot be encoded
 * ends the attempt with `UnabortableTransactionError`.
 */
export class TransactionalTree<K, V> {
  constructor(private readonly deps: TransactionalTreeDeps<K, V>) {}

  get name(): string {
    return this.deps.raw.name
  }

  insert(key: K, value: V): TreeResult<ValueView<V>> {
    this.ensureActive()

    const encodedKey = this.encode(this.deps.keyCodec, key, "insert")
    const encodedValue = this.encode(this.deps.valueCodec, value, "insert")

    return this.valueResult(
      guard(this.name, "insert", () => this.deps.raw.insert(encodedKey, encodedValue)),
    )
  }

  get(key: K): TreeResult<ValueView<V>> {
    this.ensureActive()

    const encodedKey = this.encode(this.deps.keyCodec, key, "get")

    return this.valueResult(guard(this.name, "get", () => this.deps.raw.get(encodedKey)))
  }

  remove(key: K): TreeResult<ValueView<V>> {
    this.ensureActive()

    const encodedKey = this.encode(this.deps.keyCodec, key, "remove")

    return this.valueResult(guard(this.name, "remove", () => this.deps.raw.remove(encodedKey)))
  }

  /**
   * Stages the batch into this attempt. The batch stays usable, since the
   * attempt may run again.
   */
  applyBatch(batch: Batch<K, V>): void {
    this.ensureActive()

    const ops = batch.operations()

    guard(this.name, "applyBatch", () => this.deps.raw.applyBatch(ops))
  }

  /**
   * Asks for a flush after commit. Does not wait.
   */
  flush(): void {
    this.ensureActive()
    this.deps.tx.scheduleFlush()
  }

  generateId(): number {
    this.ensureActive()

    return this.deps.tx.generateId()
  }

  private encode<T>(codec: EntryCodec<T>, value: T, operation: string): Uint8Array {
    try {
      return codec.encodeShared(value)
    } catch (err) {
      if (!(err instanceof EncodeError)) throw err

      throw new UnabortableTransactionError(
        `Transactional ${operation} on tree "${this.name}" could not encode its input`,
        { cause: err, context: { tree: this.name, operation } },
      )
    }
  }

  private ensureActive(): void {
    if (!this.deps.tx.active) {
      throw new UsageError(`Transactional view of tree "${this.name}" used after its attempt ended`, {
        context: { tree: this.name },
      })
    }
  }

  private valueResult(raw: Uint8Array | undefined): TreeResult<ValueView<V>> {
    if (raw === undefined) return { kind: "not_found" }

    return { kind: "found", value: new ValueView(raw, this.deps.valueCodec) }
  }
}
