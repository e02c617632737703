import type { RawBytes } from "../../ports/raw-bytes"

/**
 * Smallest byte string greater than every string starting with `prefix`,
 * or `undefined` when no such string exists (empty or all-0xff prefix).
 */
export function prefixSuccessor(prefix: RawBytes): RawBytes | undefined {
  for (let i = prefix.length - 1; i >= 0; i--) {
    const byte = prefix[i]

    if (byte !== undefined && byte < 0xff) {
      const out = new Uint8Array(prefix.subarray(0, i + 1))
      out[i] = byte + 1
      return out
    }
  }

  return undefined
}
