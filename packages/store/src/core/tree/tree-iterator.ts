import type { RawCursor, RawEntry } from "@kvtree/engine"
import type { EntryCodec } from "../../ports/entry-codec"
import { KeyValueView, type KeyView, type ValueView } from "../views/views"
import { ProjectedIterator, step } from "./projected-iterator"

export type TreeIteratorDeps<K, V> = {
  cursor: RawCursor
  keyCodec: EntryCodec<K>
  valueCodec: EntryCodec<V>
}

/**
 * Ordered, lazy, double-ended iteration over a tree range.
 *
 * Nothing is decoded until a view's `decode()` is called, so an element
 * with bad bytes only fails when that element is decoded.
 */
export class TreeIterator<K, V> implements IterableIterator<KeyValueView<K, V>> {
  constructor(private readonly deps: TreeIteratorDeps<K, V>) {}

  next(): IteratorResult<KeyValueView<K, V>, undefined> {
    return step(this.front())
  }

  nextBack(): IteratorResult<KeyValueView<K, V>, undefined> {
    return step(this.back())
  }

  reversed(): ProjectedIterator<KeyValueView<K, V>> {
    return new ProjectedIterator(
      () => this.back(),
      () => this.front(),
    )
  }

  keys(): ProjectedIterator<KeyView<K>> {
    return new ProjectedIterator(
      () => this.front()?.key,
      () => this.back()?.key,
    )
  }

  values(): ProjectedIterator<ValueView<V>> {
    return new ProjectedIterator(
      () => this.front()?.value,
      () => this.back()?.value,
    )
  }

  [Symbol.iterator](): TreeIterator<K, V> {
    return this
  }

  private front(): KeyValueView<K, V> | undefined {
    return this.view(this.deps.cursor.next())
  }

  private back(): KeyValueView<K, V> | undefined {
    return this.view(this.deps.cursor.nextBack())
  }

  private view(entry: RawEntry | undefined): KeyValueView<K, V> | undefined {
    return entry && new KeyValueView(entry, this.deps.keyCodec, this.deps.valueCodec)
  }
}
