import { MemoryEngine, type MemoryEngineOptions } from "@kvtree/engine"
import { z } from "zod"
import { utf8Codec } from "../core/codec/utf8-codec"
import { createDatabase, type DatabaseOptions } from "../core/database/database"
import { defineEntry } from "../core/entry/define-entry"

export const PersonSchema = z.object({
  name: z.string(),
  age: z.number().int(),
  tags: z.array(z.string()).optional(),
})

export type Person = z.infer<typeof PersonSchema>

/** Person by handle; utf8 keys keep string order and prefixes. */
export const People = defineEntry({ key: utf8Codec, value: PersonSchema })

/** Counter by name; MessagePack on both sides. */
export const Counters = defineEntry({ key: z.string(), value: z.number().int() })

/** Accepts any value, including ones with no encoding. */
export const Anything = defineEntry({ key: z.string(), value: z.unknown() })

/** Binary payloads; decoded blobs are views into the entry's bytes. */
export const Blobs = defineEntry({
  key: z.string(),
  value: z.object({ blob: z.instanceof(Uint8Array) }),
})

export const ann: Person = { name: "Ann", age: 34 }
export const bob: Person = { name: "Bob", age: 27, tags: ["admin"] }

export function openTestDatabase(
  opts: DatabaseOptions = {},
  engineOpts: MemoryEngineOptions = {},
) {
  const engine = new MemoryEngine({}, engineOpts)
  const db = createDatabase({ engine }, opts)

  return { engine, db }
}

/**
 * Decodes every element of an iterator into [key, value] pairs.
 */
export function decodeAll<K, V>(iterator: Iterable<{ decode(): [K, V] }>): [K, V][] {
  return Array.from(iterator, (view) => view.decode())
}
