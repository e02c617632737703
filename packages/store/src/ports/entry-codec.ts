/**
 * A codec bound to one side (key or value) of one tree. Failures surface as
 * `EncodeError` / `DecodeError`.
 */
export interface EntryCodec<T> {
  /**
   * Encodes into storage owned by the codec. The result is only valid until
   * the next encode on the same codec, so hand it to something that copies.
   */
  encodeShared(value: T): Uint8Array

  /**
   * Encodes into a fresh array the caller owns.
   */
  encode(value: T): Uint8Array

  decode(bytes: Uint8Array): T
}
