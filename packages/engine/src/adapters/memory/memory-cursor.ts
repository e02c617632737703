import type { RawBound, RawEntry, RawRange } from "../../ports/raw-bytes"
import type { RawCursor } from "../../ports/raw-cursor"
import type { MemoryEntry, SortedEntries } from "./sorted-entries"

/**
 * Live cursor: each step re-seeks against the current entries, so writes
 * made between steps are observed and nothing is materialized up front.
 */
export class MemoryCursor implements RawCursor {
  private lo: RawBound
  private hi: RawBound
  private exhausted = false

  constructor(
    private readonly entries: () => SortedEntries,
    private readonly emit: (entry: MemoryEntry) => RawEntry,
    range: RawRange,
  ) {
    this.lo = range.start
    this.hi = range.end
  }

  next(): RawEntry | undefined {
    if (this.exhausted) return undefined

    const entries = this.entries()
    const start = entries.startIndex(this.lo)
    const entry = start < entries.endIndex(this.hi) ? entries.at(start) : undefined

    if (!entry) {
      this.exhausted = true
      return undefined
    }

    this.lo = { kind: "excluded", key: entry.key }
    return this.emit(entry)
  }

  nextBack(): RawEntry | undefined {
    if (this.exhausted) return undefined

    const entries = this.entries()
    const end = entries.endIndex(this.hi)
    const entry = entries.startIndex(this.lo) < end ? entries.at(end - 1) : undefined

    if (!entry) {
      this.exhausted = true
      return undefined
    }

    this.hi = { kind: "excluded", key: entry.key }
    return this.emit(entry)
  }
}
