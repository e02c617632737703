import type { RawEntry } from "./raw-bytes"

/**
 * Double-ended cursor over an ordered key range.
 *
 * @remarks
 * The two ends never yield the same entry. Between them they visit each
 * entry of the range at most once, then return `undefined` for good.
 */
export interface RawCursor {
  next(): RawEntry | undefined
  nextBack(): RawEntry | undefined
}
