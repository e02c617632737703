import { Decoder, decode, Encoder, encode, ExtensionCodec } from "@msgpack/msgpack"

const SET_EXT_TYPE = 0
const MAP_EXT_TYPE = 1

/**
 * `Set` and `Map` travel as extensions wrapping an array of members or of
 * `[key, value]` pairs, in iteration order.
 */
export const extensionCodec = new ExtensionCodec()

extensionCodec.register({
  type: SET_EXT_TYPE,
  encode: (input: unknown) => (input instanceof Set ? encodeNested([...input]) : null),
  decode: (data: Uint8Array) => new Set(decodeArray(data, "Set")),
})

extensionCodec.register({
  type: MAP_EXT_TYPE,
  encode: (input: unknown) => (input instanceof Map ? encodeNested([...input]) : null),
  decode: (data: Uint8Array) => new Map(decodeArray(data, "Map").map(toPair)),
})

const options = {
  extensionCodec,
  sortKeys: true,
  ignoreUndefined: true,
  useBigInt64: false,
} as const

/**
 * The one encoder configuration every tree uses. Map keys are sorted so
 * equal values always produce equal bytes; undefined properties are left
 * out. Functions and symbols have no encoding.
 *
 * Numbers with an integer value are written as integers, so `-0` reads back
 * as `0`.
 */
export function createEncoder(initialBufferSize: number): Encoder {
  return new Encoder({ ...options, initialBufferSize })
}

/**
 * Binary fields decode as views into the source bytes.
 */
export const sharedDecoder = new Decoder({ extensionCodec })

function encodeNested(members: unknown[]): Uint8Array {
  return encode(members, options)
}

function decodeArray(data: Uint8Array, kind: string): unknown[] {
  const members = decode(data, { extensionCodec })

  if (!Array.isArray(members)) {
    throw new TypeError(`${kind} extension does not hold an array`)
  }

  return members
}

function toPair(member: unknown): [unknown, unknown] {
  if (!Array.isArray(member) || member.length !== 2) {
    throw new TypeError("Map extension entry is not a [key, value] pair")
  }

  return [member[0], member[1]]
}
