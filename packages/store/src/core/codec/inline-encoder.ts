import type { Encoder } from "@msgpack/msgpack"
import { createEncoder } from "./msgpack"

type Encoded = {
  readonly bytes: Uint8Array
  readonly spilled: boolean
}

/**
 * Small-buffer encoding.
 *
 * Encodes into a buffer of fixed `capacity`. An encoding that fits is a view
 * into that buffer. One that does not fit ends up in a buffer the encoder
 * grew for it; that buffer is handed over to the result and a fresh inline
 * buffer is started.
 */
export class InlineEncoder {
  private encoder: Encoder
  private spills = 0

  constructor(readonly capacity: number) {
    this.encoder = createEncoder(capacity)
  }

  /**
   * Number of encodings that outgrew the inline buffer.
   */
  get spillCount(): number {
    return this.spills
  }

  /**
   * Valid until the next encode on this instance.
   */
  encodeShared(value: unknown): Uint8Array {
    return this.encodeInline(value).bytes
  }

  encode(value: unknown): Uint8Array {
    const { bytes, spilled } = this.encodeInline(value)

    return spilled ? bytes : bytes.slice()
  }

  private encodeInline(value: unknown): Encoded {
    let bytes: Uint8Array

    try {
      bytes = this.encoder.encodeSharedRef(value)
    } catch (err) {
      this.encoder = createEncoder(this.capacity)
      throw err
    }

    if (bytes.buffer.byteLength === this.capacity) return { bytes, spilled: false }

    this.spills++
    this.encoder = createEncoder(this.capacity)

    return { bytes, spilled: true }
  }
}
