import type { Codec } from "../../ports/codec"

const encoder = new TextEncoder()
const decoder = new TextDecoder("utf-8", { fatal: true })

/**
 * Plain UTF-8 strings. Byte order matches code point order and string
 * prefixes are byte prefixes, so it suits keys queried by range or prefix.
 */
export const utf8Codec: Codec<string> = {
  encode(value) {
    return encoder.encode(value)
  },
  decode(bytes) {
    return decoder.decode(bytes)
  },
}
