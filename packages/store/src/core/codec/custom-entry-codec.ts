import { DecodeError, EncodeError, isStoreError } from "@kvtree/errors"
import type { Codec } from "../../ports/codec"
import type { EntryCodec } from "../../ports/entry-codec"
import type { CodecLabel } from "./msgpack-entry-codec"

/**
 * Adapts a user-supplied `Codec`. Every encode returns owned bytes; thrown
 * errors become `EncodeError` / `DecodeError`.
 */
export class CustomEntryCodec<T> implements EntryCodec<T> {
  constructor(
    private readonly codec: Codec<T>,
    private readonly label: CodecLabel,
  ) {}

  encodeShared(value: T): Uint8Array {
    return this.encode(value)
  }

  encode(value: T): Uint8Array {
    try {
      return this.codec.encode(value)
    } catch (err) {
      if (isStoreError(err)) throw err

      throw new EncodeError(
        `Cannot encode ${this.label.part} for tree "${this.label.tree}"`,
        { cause: err, context: { ...this.label } },
      )
    }
  }

  decode(bytes: Uint8Array): T {
    try {
      return this.codec.decode(bytes)
    } catch (err) {
      if (isStoreError(err)) throw err

      throw new DecodeError(
        `Cannot decode ${this.label.part} of tree "${this.label.tree}"`,
        { cause: err, context: { ...this.label, bytes: bytes.byteLength } },
      )
    }
  }
}
