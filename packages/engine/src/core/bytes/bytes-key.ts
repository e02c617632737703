import type { RawBytes } from "../../ports/raw-bytes"

/**
 * Hex form of `bytes`, usable as a Map key.
 */
export function toBytesKey(bytes: RawBytes): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("hex")
}

export function copyBytes(bytes: RawBytes): RawBytes {
  return new Uint8Array(bytes)
}
