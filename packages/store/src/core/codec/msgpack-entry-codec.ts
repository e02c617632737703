import { DecodeError, EncodeError } from "@kvtree/errors"
import { type ZodType, z } from "zod"
import type { EntryCodec } from "../../ports/entry-codec"
import { InlineEncoder } from "./inline-encoder"
import { sharedDecoder } from "./msgpack"

export type CodecLabel = {
  readonly tree: string
  readonly part: "key" | "value"
}

export type MsgpackEntryCodecOptions = {
  inlineBufferBytes: number
}

/**
 * MessagePack on the wire, zod at both ends: values that do not match the
 * schema are refused before encoding, and decoded data is checked again so
 * bytes written for another type fail to decode instead of being trusted.
 */
export class MsgpackEntryCodec<T> implements EntryCodec<T> {
  private readonly inline: InlineEncoder

  constructor(
    private readonly schema: ZodType<T>,
    private readonly label: CodecLabel,
    opts: MsgpackEntryCodecOptions,
  ) {
    this.inline = new InlineEncoder(opts.inlineBufferBytes)
  }

  get spillCount(): number {
    return this.inline.spillCount
  }

  encodeShared(value: T): Uint8Array {
    const data = this.validate(value)

    try {
      return this.inline.encodeShared(data)
    } catch (err) {
      throw this.encodeError(err)
    }
  }

  encode(value: T): Uint8Array {
    const data = this.validate(value)

    try {
      return this.inline.encode(data)
    } catch (err) {
      throw this.encodeError(err)
    }
  }

  decode(bytes: Uint8Array): T {
    let data: unknown

    try {
      data = sharedDecoder.decode(bytes)
    } catch (err) {
      throw new DecodeError(
        `Cannot decode ${this.label.part} of tree "${this.label.tree}": ${messageOf(err)}`,
        { cause: err, context: { ...this.label, bytes: bytes.byteLength } },
      )
    }

    const result = this.schema.safeParse(data)

    if (!result.success) {
      throw new DecodeError(
        `Decoded ${this.label.part} of tree "${this.label.tree}" does not match its schema:\n${z.prettifyError(result.error)}`,
        { cause: result.error, context: { ...this.label, bytes: bytes.byteLength } },
      )
    }

    return result.data
  }

  /**
   * Values are checked on the way out as well, so nothing is written that
   * would fail to decode.
   */
  private validate(value: T): T {
    const result = this.schema.safeParse(value)

    if (!result.success) {
      throw new EncodeError(
        `${capitalize(this.label.part)} for tree "${this.label.tree}" does not match its schema:\n${z.prettifyError(result.error)}`,
        { cause: result.error, context: { ...this.label } },
      )
    }

    return result.data
  }

  private encodeError(err: unknown): EncodeError {
    return new EncodeError(
      `Cannot encode ${this.label.part} for tree "${this.label.tree}": ${messageOf(err)}`,
      { cause: err, context: { ...this.label } },
    )
  }
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1)
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
