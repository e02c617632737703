import type { ZodType } from "zod"
import type { CodecSource } from "../../ports/entry"
import type { EntryCodec } from "../../ports/entry-codec"
import { CustomEntryCodec } from "./custom-entry-codec"
import { type CodecLabel, MsgpackEntryCodec } from "./msgpack-entry-codec"

export type BindCodecOptions = {
  inlineBufferBytes: number
}

export function isSchema<T>(source: CodecSource<T>): source is ZodType<T> {
  return "safeParse" in source && typeof source.safeParse === "function"
}

export function bindCodec<T>(
  source: CodecSource<T>,
  label: CodecLabel,
  opts: BindCodecOptions,
): EntryCodec<T> {
  if (isSchema(source)) {
    return new MsgpackEntryCodec(source, label, opts)
  }

  return new CustomEntryCodec(source, label)
}
