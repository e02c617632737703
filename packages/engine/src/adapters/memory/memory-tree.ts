import { StorageError } from "@kvtree/errors"
import { copyBytes, toBytesKey } from "../../core/bytes/bytes-key"
import { prefixSuccessor } from "../../core/bytes/prefix-successor"
import type { RawBatchOp, RawBound, RawBytes, RawEntry, RawRange } from "../../ports/raw-bytes"
import type { RawCursor } from "../../ports/raw-cursor"
import type { RawTree } from "../../ports/raw-tree"
import { MemoryCursor } from "./memory-cursor"
import { type MemoryEntry, SortedEntries } from "./sorted-entries"

/**
 * What a tree needs from the engine that owns it.
 */
export interface MemoryTreeHost {
  ensureOpen(): void
  nextVersion(): number
  recordWrite(bytes: number): void
  readonly maxEntriesPerTree: number | undefined
}

/**
 * A write staged for commit; `value: undefined` removes the key.
 */
export type StagedWrite = {
  readonly key: RawBytes
  readonly value: RawBytes | undefined
}

export class MemoryTree implements RawTree {
  private readonly entries = new SortedEntries()
  private dropped = false

  constructor(
    private readonly host: MemoryTreeHost,
    readonly name: string,
  ) {}

  /**
   * Returned bytes are copies; callers may keep or mutate them.
   */
  get(key: RawBytes): RawBytes | undefined {
    const entry = this.live().find(key)

    return entry && copyBytes(entry.value)
  }

  insert(key: RawBytes, value: RawBytes): RawBytes | undefined {
    const entries = this.live()

    if (!entries.find(key)) this.ensureCapacity(entries.size + 1)

    return this.put(key, value)?.value
  }

  remove(key: RawBytes): RawBytes | undefined {
    return this.drop(key)?.value
  }

  containsKey(key: RawBytes): boolean {
    return this.live().find(key) !== undefined
  }

  first(): RawEntry | undefined {
    const entry = this.live().at(0)

    return entry && copyEntry(entry)
  }

  last(): RawEntry | undefined {
    const entries = this.live()
    const entry = entries.at(entries.size - 1)

    return entry && copyEntry(entry)
  }

  range(range: RawRange): RawCursor {
    this.live()

    return new MemoryCursor(() => this.live(), copyEntry, {
      start: copyBound(range.start),
      end: copyBound(range.end),
    })
  }

  scanPrefix(prefix: RawBytes): RawCursor {
    const end = prefixSuccessor(prefix)

    return this.range({
      start: { kind: "included", key: prefix },
      end: end ? { kind: "excluded", key: end } : { kind: "unbounded" },
    })
  }

  applyBatch(ops: readonly RawBatchOp[]): void {
    this.applyStaged(
      ops.map((op) => ({ key: op.key, value: op.kind === "insert" ? op.value : undefined })),
    )
  }

  popMin(): RawEntry | undefined {
    const entry = this.live().at(0)

    return entry ? this.popEntry(entry) : undefined
  }

  popMax(): RawEntry | undefined {
    const entries = this.live()
    const entry = entries.at(entries.size - 1)

    return entry ? this.popEntry(entry) : undefined
  }

  len(): number {
    return this.live().size
  }

  isEmpty(): boolean {
    return this.live().size === 0
  }

  clear(): void {
    const entries = this.live()

    for (let i = 0; i < entries.size; i++) {
      this.host.recordWrite(entries.at(i)?.key.length ?? 0)
    }

    entries.clear()
  }

  /**
   * Version of the entry stored under `key`, `undefined` when absent.
   */
  versionOf(key: RawBytes): number | undefined {
    return this.live().find(key)?.version
  }

  /**
   * Applies staged writes in order after checking the final entry count.
   * Either every write lands or none does.
   */
  applyStaged(writes: readonly StagedWrite[]): void {
    const entries = this.live()
    this.ensureCapacity(this.projectedSize(entries, writes))

    for (const write of writes) {
      if (write.value === undefined) this.drop(write.key)
      else this.put(write.key, write.value)
    }
  }

  /**
   * Checks the writes against capacity without applying them.
   */
  checkStaged(writes: readonly StagedWrite[]): void {
    this.ensureCapacity(this.projectedSize(this.live(), writes))
  }

  markDropped(): void {
    this.dropped = true
    this.entries.clear()
  }

  private put(key: RawBytes, value: RawBytes): MemoryEntry | undefined {
    const previous = this.live().upsert(copyBytes(key), copyBytes(value), this.host.nextVersion())
    this.host.recordWrite(key.length + value.length)

    return previous
  }

  private drop(key: RawBytes): MemoryEntry | undefined {
    const removed = this.live().delete(key)
    if (removed) this.host.recordWrite(key.length)

    return removed
  }

  private popEntry(entry: MemoryEntry): RawEntry {
    this.drop(entry.key)

    return [entry.key, entry.value]
  }

  private projectedSize(entries: SortedEntries, writes: readonly StagedWrite[]): number {
    const present = new Map<string, boolean>()
    let size = entries.size

    for (const write of writes) {
      const id = toBytesKey(write.key)
      const was = present.get(id) ?? entries.find(write.key) !== undefined
      const is = write.value !== undefined

      if (was !== is) size += is ? 1 : -1
      present.set(id, is)
    }

    return size
  }

  private ensureCapacity(size: number): void {
    const max = this.host.maxEntriesPerTree

    if (max !== undefined && size > max) {
      throw new StorageError(`Tree "${this.name}" would exceed ${max} entries`, {
        context: { tree: this.name, maxEntriesPerTree: max },
      })
    }
  }

  private live(): SortedEntries {
    this.host.ensureOpen()

    if (this.dropped) {
      throw new StorageError(`Tree "${this.name}" was dropped`, { context: { tree: this.name } })
    }

    return this.entries
  }
}

function copyEntry(entry: MemoryEntry): RawEntry {
  return [copyBytes(entry.key), copyBytes(entry.value)]
}

function copyBound(bound: RawBound): RawBound {
  return bound.kind === "unbounded" ? bound : { kind: bound.kind, key: copyBytes(bound.key) }
}
