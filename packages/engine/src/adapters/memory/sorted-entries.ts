import { compareBytes } from "../../core/bytes/compare-bytes"
import type { RawBound, RawBytes } from "../../ports/raw-bytes"

export type MemoryEntry = {
  readonly key: RawBytes
  value: RawBytes
  version: number
}

/**
 * Entries kept sorted by key, located by binary search.
 */
export class SortedEntries {
  private readonly entries: MemoryEntry[] = []

  get size(): number {
    return this.entries.length
  }

  at(index: number): MemoryEntry | undefined {
    return this.entries[index]
  }

  find(key: RawBytes): MemoryEntry | undefined {
    const i = this.lowerBound(key)
    const entry = this.entries[i]

    return entry && compareBytes(entry.key, key) === 0 ? entry : undefined
  }

  /**
   * Inserts or replaces. The caller owns `key` and `value` from here on.
   */
  upsert(key: RawBytes, value: RawBytes, version: number): MemoryEntry | undefined {
    const i = this.lowerBound(key)
    const existing = this.entries[i]

    if (existing && compareBytes(existing.key, key) === 0) {
      const previous = { ...existing }
      existing.value = value
      existing.version = version
      return previous
    }

    this.entries.splice(i, 0, { key, value, version })
    return undefined
  }

  delete(key: RawBytes): MemoryEntry | undefined {
    const i = this.lowerBound(key)
    const existing = this.entries[i]

    if (!existing || compareBytes(existing.key, key) !== 0) return undefined

    this.entries.splice(i, 1)
    return existing
  }

  clear(): void {
    this.entries.length = 0
  }

  /**
   * Index of the first entry inside a range starting at `bound`.
   */
  startIndex(bound: RawBound): number {
    switch (bound.kind) {
      case "unbounded":
        return 0
      case "included":
        return this.lowerBound(bound.key)
      case "excluded":
        return this.upperBound(bound.key)
    }
  }

  /**
   * Index one past the last entry inside a range ending at `bound`.
   */
  endIndex(bound: RawBound): number {
    switch (bound.kind) {
      case "unbounded":
        return this.entries.length
      case "included":
        return this.upperBound(bound.key)
      case "excluded":
        return this.lowerBound(bound.key)
    }
  }

  /** First index whose key is >= `key`. */
  private lowerBound(key: RawBytes): number {
    let lo = 0
    let hi = this.entries.length

    while (lo < hi) {
      const mid = (lo + hi) >>> 1
      const entry = this.entries[mid]

      if (entry && compareBytes(entry.key, key) < 0) lo = mid + 1
      else hi = mid
    }

    return lo
  }

  /** First index whose key is > `key`. */
  private upperBound(key: RawBytes): number {
    let lo = 0
    let hi = this.entries.length

    while (lo < hi) {
      const mid = (lo + hi) >>> 1
      const entry = this.entries[mid]

      if (entry && compareBytes(entry.key, key) <= 0) lo = mid + 1
      else hi = mid
    }

    return lo
  }
}
