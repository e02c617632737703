export type TreeFound<T> = {
  readonly kind: "found"
  readonly value: T
}

export type TreeNotFound = {
  readonly kind: "not_found"
}

/**
 * Result of a lookup. A miss is an ordinary outcome, not an error.
 */
export type TreeResult<T> = TreeFound<T> | TreeNotFound
