/**
 * Codec defines a bidirectional transformation between a typed value `T`
 * and a byte representation.
 *
 * @remarks
 * Codecs should be pure, deterministic transforms. Trees iterate and range
 * over the encoded bytes, so a key codec decides the key order: pick one
 * whose byte order matches the order you query by.
 *
 * @example
 * ```ts
 * const upperCodec: Codec<string> = {
 *   encode(value) {
 *     return new TextEncoder().encode(value.toUpperCase())
 *   },
 *   decode(bytes) {
 *     return new TextDecoder().decode(bytes)
 *   },
 * }
 * ```
 */
export interface Codec<T> {
  encode(value: T): Uint8Array
  decode(bytes: Uint8Array): T
}
