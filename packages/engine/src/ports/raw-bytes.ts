/**
 * Byte strings as the engine stores them. Keys order by unsigned
 * lexicographic comparison.
 */
export type RawBytes = Uint8Array

export type RawEntry = readonly [key: RawBytes, value: RawBytes]

export type RawBound =
  | { readonly kind: "included"; readonly key: RawBytes }
  | { readonly kind: "excluded"; readonly key: RawBytes }
  | { readonly kind: "unbounded" }

export type RawRange = {
  readonly start: RawBound
  readonly end: RawBound
}

export type RawBatchOp =
  | { readonly kind: "insert"; readonly key: RawBytes; readonly value: RawBytes }
  | { readonly kind: "remove"; readonly key: RawBytes }

export const unbounded: RawBound = { kind: "unbounded" }

export const fullRange: RawRange = { start: unbounded, end: unbounded }
