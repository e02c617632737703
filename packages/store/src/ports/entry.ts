import type { ZodType } from "zod"
import type { Codec } from "./codec"

/**
 * How one side of an entry is stored: a zod schema (MessagePack on disk,
 * validated on read) or a custom `Codec`.
 */
export type CodecSource<T> = ZodType<T> | Codec<T>

/**
 * Binds a key type and a value type to a tree.
 */
export type Entry<K, V> = {
  readonly key: CodecSource<K>
  readonly value: CodecSource<V>
}

export type KeyOf<E> = E extends Entry<infer K, unknown> ? K : never

export type ValueOf<E> = E extends Entry<unknown, infer V> ? V : never
