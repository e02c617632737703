import type { RawBound, RawRange } from "@kvtree/engine"
import type { EntryCodec } from "../../ports/entry-codec"
import type { Bound, KeyRange } from "../../ports/key-range"

export const included = <K>(key: K): Bound<K> => ({ kind: "included", key })

export const excluded = <K>(key: K): Bound<K> => ({ kind: "excluded", key })

export const unbounded: Bound<never> = { kind: "unbounded" }

/**
 * Encodes both bounds into owned bytes; the engine may keep them for as long
 * as the cursor lives.
 */
export function toRawRange<K>(range: KeyRange<K>, codec: EntryCodec<K>): RawRange {
  return {
    start: toRawBound(range.start, codec),
    end: toRawBound(range.end, codec),
  }
}

function toRawBound<K>(bound: Bound<K> | undefined, codec: EntryCodec<K>): RawBound {
  if (bound === undefined || bound.kind === "unbounded") return { kind: "unbounded" }

  return { kind: bound.kind, key: codec.encode(bound.key) }
}
