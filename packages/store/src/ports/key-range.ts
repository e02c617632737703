export type Bound<K> =
  | { readonly kind: "included"; readonly key: K }
  | { readonly kind: "excluded"; readonly key: K }
  | { readonly kind: "unbounded" }

/**
 * A key range over encoded key order. An omitted side is unbounded.
 */
export type KeyRange<K> = {
  readonly start?: Bound<K>
  readonly end?: Bound<K>
}
