import { DecodeError, EncodeError } from "@kvtree/errors"
import { encode } from "@msgpack/msgpack"
import { z } from "zod"
import { type Person, PersonSchema } from "../../../tests/fixtures"
import { MsgpackEntryCodec } from "../msgpack-entry-codec"

const label = { tree: "people", part: "value" } as const

function personCodec(inlineBufferBytes = 64) {
  return new MsgpackEntryCodec(PersonSchema, label, { inlineBufferBytes })
}

describe("MsgpackEntryCodec", () => {
  it("round-trips values through the schema", () => {
    const codec = personCodec()
    const person: Person = { name: "Ann", age: 34, tags: ["a", "b"] }

    expect(codec.decode(codec.encode(person))).toStrictEqual(person)
  })

  it("leaves undefined properties out of the encoding", () => {
    const codec = personCodec()

    const withUndefined = codec.encode({ name: "Ann", age: 34, tags: undefined })
    const without = codec.encode({ name: "Ann", age: 34 })

    expect(withUndefined).toStrictEqual(without)
    expect(codec.decode(without)).toStrictEqual({ name: "Ann", age: 34 })
  })

  it("is deterministic regardless of property order", () => {
    const codec = new MsgpackEntryCodec(z.object({ a: z.number(), b: z.number() }), label, {
      inlineBufferBytes: 64,
    })

    expect(codec.encode({ a: 1, b: 2 })).toStrictEqual(codec.encode({ b: 2, a: 1 }))
  })

  it("encodes identically with and without spilling", () => {
    const person: Person = { name: "A".repeat(300), age: 1 }
    const tiny = personCodec(8)
    const roomy = personCodec(4096)

    const spilled = tiny.encode(person)

    expect(spilled).toStrictEqual(roomy.encode(person))
    expect(tiny.spillCount).toBe(1)
    expect(roomy.spillCount).toBe(0)
    expect(tiny.decode(spilled)).toStrictEqual(person)
  })

  it("reports truncated bytes as DecodeError", () => {
    const codec = personCodec()
    const truncated = codec.encode({ name: "Ann", age: 34 }).subarray(0, 3)

    expect(() => codec.decode(truncated)).toThrow(DecodeError)
  })

  it("reports bytes written for another type as DecodeError", () => {
    const codec = personCodec()

    const attempt = () => codec.decode(encode(42))

    expect(attempt).toThrow(DecodeError)
    expect(attempt).toThrow('Decoded value of tree "people" does not match its schema')
  })

  it("carries the tree and part in decode errors", () => {
    const codec = personCodec()

    try {
      codec.decode(Uint8Array.of(0xc1))
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(DecodeError)
      expect(err).toMatchObject({ context: { tree: "people", part: "value", bytes: 1 } })
    }
  })

  it("reports values with no encoding as EncodeError", () => {
    const codec = new MsgpackEntryCodec(z.unknown(), label, { inlineBufferBytes: 64 })

    const attempt = () => codec.encodeShared({ callback: () => undefined })

    expect(attempt).toThrow(EncodeError)
    expect(attempt).toThrow('Cannot encode value for tree "people"')
  })

  it("decodes binary fields as views into the source bytes", () => {
    const codec = new MsgpackEntryCodec(z.object({ blob: z.instanceof(Uint8Array) }), label, {
      inlineBufferBytes: 64,
    })
    const bytes = codec.encode({ blob: Uint8Array.of(1, 2, 3) })

    const { blob } = codec.decode(bytes)

    expect(Array.from(blob)).toEqual([1, 2, 3])
    expect(blob.buffer).toBe(bytes.buffer)
  })

  it("round-trips sets", () => {
    const codec = new MsgpackEntryCodec(z.set(z.string()), label, { inlineBufferBytes: 64 })

    const decoded = codec.decode(codec.encode(new Set(["x", "y"])))

    expect(decoded).toBeInstanceOf(Set)
    expect([...decoded]).toStrictEqual(["x", "y"])
  })

  it("round-trips maps, nested ones included", () => {
    const codec = new MsgpackEntryCodec(
      z.object({ scores: z.map(z.string(), z.number()), seen: z.set(z.number()) }),
      label,
      { inlineBufferBytes: 8 },
    )
    const value = {
      scores: new Map([
        ["b", 2],
        ["a", 1],
      ]),
      seen: new Set([3, 1]),
    }

    const decoded = codec.decode(codec.encode(value))

    expect([...decoded.scores]).toStrictEqual([
      ["b", 2],
      ["a", 1],
    ])
    expect([...decoded.seen]).toStrictEqual([3, 1])
  })

  it("refuses values that do not match the schema before encoding", () => {
    const codec = new MsgpackEntryCodec(z.number().int(), label, { inlineBufferBytes: 64 })

    try {
      codec.encodeShared(1.5)
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(EncodeError)
      expect(err).toMatchObject({ context: { tree: "people", part: "value" } })
      expect(err instanceof Error && err.message).toMatch(
        /^Value for tree "people" does not match its schema:\n/,
      )
    }

    expect(() => codec.encode(1.5)).toThrow(EncodeError)
  })

  it("encodes what the schema outputs", () => {
    const codec = personCodec()
    const extra = { name: "Ann", age: 34, nickname: "annie" }

    expect(codec.encode(extra)).toStrictEqual(codec.encode({ name: "Ann", age: 34 }))
  })

  it("reads negative zero back as zero", () => {
    const codec = new MsgpackEntryCodec(z.number(), label, { inlineBufferBytes: 64 })

    expect(Object.is(codec.decode(codec.encode(-0)), 0)).toBe(true)
    expect(codec.decode(codec.encode(-0.5))).toBe(-0.5)
  })
})
