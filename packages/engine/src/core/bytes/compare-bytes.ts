import type { RawBytes } from "../../ports/raw-bytes"

/**
 * Unsigned lexicographic order. A proper prefix sorts before its extensions.
 */
export function compareBytes(a: RawBytes, b: RawBytes): number {
  return Buffer.compare(a, b)
}
