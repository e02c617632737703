import type { RawCursor, RawEngine, RawEntry, RawTransaction, RawTree } from "@kvtree/engine"
import type { Logger } from "@kvtree/logger"
import type { EntryCodec } from "../../ports/entry-codec"
import type { KeyRange } from "../../ports/key-range"
import type { TreeResult } from "../../ports/tree-result"
import { toRawRange } from "../range/to-raw-range"
import {
  executeTransaction,
  type TransactionOptions,
} from "../transaction/execute-transaction"
import { TransactionalTree } from "../transaction/transactional-tree"
import { KeyValueView, ValueView } from "../views/views"
import { Batch } from "./batch"
import { guard } from "./guard"
import { TreeIterator } from "./tree-iterator"

export type TreeDeps<K, V> = {
  engine: RawEngine
  raw: RawTree
  keyCodec: EntryCodec<K>
  valueCodec: EntryCodec<V>
  logger: Logger
}

export type TreeOptions = {
  /**
   * Default conflict retry limit for transactions started from this tree.
   * Unset retries until commit.
   */
  maxTransactionRetries?: number
}

/**
 * Typed view of one engine tree. Keys and values are encoded on the way in;
 * everything coming out is a lazily decoded view.
 */
export class Tree<K, V> {
  constructor(
    private readonly deps: TreeDeps<K, V>,
    private readonly opts: TreeOptions = {},
  ) {}

  get name(): string {
    return this.deps.raw.name
  }

  /** @internal */
  get engine(): RawEngine {
    return this.deps.engine
  }

  /** @internal */
  get raw(): RawTree {
    return this.deps.raw
  }

  /** @internal */
  get logger(): Logger {
    return this.deps.logger
  }

  /** @internal */
  get defaultMaxRetries(): number | undefined {
    return this.opts.maxTransactionRetries
  }

  /**
   * Stores `value` under `key`; returns the value it replaced.
   */
  insert(key: K, value: V): TreeResult<ValueView<V>> {
    const encodedKey = this.deps.keyCodec.encodeShared(key)
    const encodedValue = this.deps.valueCodec.encodeShared(value)

    return this.valueResult(
      guard(this.name, "insert", () => this.deps.raw.insert(encodedKey, encodedValue)),
    )
  }

  get(key: K): TreeResult<ValueView<V>> {
    const encodedKey = this.deps.keyCodec.encodeShared(key)

    return this.valueResult(guard(this.name, "get", () => this.deps.raw.get(encodedKey)))
  }

  /**
   * Removes `key`; returns the value it held. An absent key is `not_found`,
   * not an error.
   */
  remove(key: K): TreeResult<ValueView<V>> {
    const encodedKey = this.deps.keyCodec.encodeShared(key)

    return this.valueResult(guard(this.name, "remove", () => this.deps.raw.remove(encodedKey)))
  }

  containsKey(key: K): boolean {
    const encodedKey = this.deps.keyCodec.encodeShared(key)

    return guard(this.name, "containsKey", () => this.deps.raw.containsKey(encodedKey))
  }

  first(): TreeResult<KeyValueView<K, V>> {
    return this.entryResult(guard(this.name, "first", () => this.deps.raw.first()))
  }

  last(): TreeResult<KeyValueView<K, V>> {
    return this.entryResult(guard(this.name, "last", () => this.deps.raw.last()))
  }

  /**
   * All entries in ascending encoded-key order.
   */
  iter(): TreeIterator<K, V> {
    return this.range({})
  }

  range(range: KeyRange<K>): TreeIterator<K, V> {
    const rawRange = toRawRange(range, this.deps.keyCodec)

    return this.iterator(guard(this.name, "range", () => this.deps.raw.range(rawRange)))
  }

  /**
   * Entries whose encoded key starts with the encoding of `prefix`. Only
   * meaningful for key codecs where that matches a logical prefix, such as
   * `utf8Codec`.
   */
  scanPrefix(prefix: K): TreeIterator<K, V> {
    const encodedPrefix = this.deps.keyCodec.encode(prefix)

    return this.iterator(
      guard(this.name, "scanPrefix", () => this.deps.raw.scanPrefix(encodedPrefix)),
    )
  }

  batch(): Batch<K, V> {
    return new Batch({ keyCodec: this.deps.keyCodec, valueCodec: this.deps.valueCodec })
  }

  /**
   * Applies every staged operation atomically, then marks the batch as used.
   */
  applyBatch(batch: Batch<K, V>): void {
    const ops = batch.operations()

    guard(this.name, "applyBatch", () => this.deps.raw.applyBatch(ops))
    batch.markConsumed()
  }

  popMin(): TreeResult<KeyValueView<K, V>> {
    return this.entryResult(guard(this.name, "popMin", () => this.deps.raw.popMin()))
  }

  popMax(): TreeResult<KeyValueView<K, V>> {
    return this.entryResult(guard(this.name, "popMax", () => this.deps.raw.popMax()))
  }

  len(): number {
    return guard(this.name, "len", () => this.deps.raw.len())
  }

  isEmpty(): boolean {
    return guard(this.name, "isEmpty", () => this.deps.raw.isEmpty())
  }

  clear(): void {
    guard(this.name, "clear", () => this.deps.raw.clear())
  }

  /**
   * Resolves once everything written so far is durable, with the number of
   * bytes the flush wrote. Concurrent callers share one flush.
   */
  async flushAsync(): Promise<number> {
    return await this.deps.engine.flushAsync()
  }

  /**
   * Single-tree transaction. `fn` may run more than once; see
   * `runTransaction`.
   */
  transaction<R>(
    fn: (tree: TransactionalTree<K, V>) => R,
    options: TransactionOptions = {},
  ): R {
    const maxRetries = options.maxRetries ?? this.opts.maxTransactionRetries

    return executeTransaction(
      { engine: this.deps.engine, logger: this.deps.logger },
      [this.deps.raw],
      { ...(maxRetries !== undefined && { maxRetries }) },
      (tx) => fn(this.attach(tx)),
    )
  }

  /** @internal */
  attach(tx: RawTransaction): TransactionalTree<K, V> {
    return new TransactionalTree({
      tx,
      raw: tx.treeFor(this.deps.raw),
      keyCodec: this.deps.keyCodec,
      valueCodec: this.deps.valueCodec,
    })
  }

  private iterator(cursor: RawCursor): TreeIterator<K, V> {
    return new TreeIterator({
      cursor,
      keyCodec: this.deps.keyCodec,
      valueCodec: this.deps.valueCodec,
    })
  }

  private valueResult(raw: Uint8Array | undefined): TreeResult<ValueView<V>> {
    if (raw === undefined) return { kind: "not_found" }

    return { kind: "found", value: new ValueView(raw, this.deps.valueCodec) }
  }

  private entryResult(entry: RawEntry | undefined): TreeResult<KeyValueView<K, V>> {
    if (entry === undefined) return { kind: "not_found" }

    return {
      kind: "found",
      value: new KeyValueView(entry, this.deps.keyCodec, this.deps.valueCodec),
    }
  }
}
