import type { CodecSource, Entry } from "../../ports/entry"

/**
 * Declares the key and value types of a tree.
 *
 * @example
 * ```ts
 * const People = defineEntry({
 *   key: utf8Codec,
 *   value: z.object({ name: z.string(), age: z.number().int() }),
 * })
 *
 * const people = db.openTree("people", People) // Tree<string, { name: string; age: number }>
 * ```
 */
export function defineEntry<K, V>(entry: {
  key: CodecSource<K>
  value: CodecSource<V>
}): Entry<K, V> {
  return Object.freeze({ key: entry.key, value: entry.value })
}
