import type { RawEntry } from "@kvtree/engine"
import type { EntryCodec } from "../../ports/entry-codec"

type Decoder<T> = Pick<EntryCodec<T>, "decode">

/**
 * Raw bytes plus a decode that runs on first use and is then cached.
 *
 * @remarks
 * The view holds the bytes it decodes from, so borrowed parts of the decoded
 * value (binary fields) stay valid for as long as the value is reachable.
 */
export abstract class LazyView<T> {
  private decoded: { readonly value: T } | undefined

  constructor(
    readonly raw: Uint8Array,
    private readonly codec: Decoder<T>,
  ) {}

  /**
   * Throws `DecodeError` when the bytes are not a valid encoding. A failed
   * decode is not cached.
   */
  decode(): T {
    if (this.decoded === undefined) {
      this.decoded = { value: this.codec.decode(this.raw) }
    }

    return this.decoded.value
  }
}

export class KeyView<K> extends LazyView<K> {}

export class ValueView<V> extends LazyView<V> {}

export class KeyValueView<K, V> {
  readonly key: KeyView<K>
  readonly value: ValueView<V>

  constructor(entry: RawEntry, keyCodec: Decoder<K>, valueCodec: Decoder<V>) {
    this.key = new KeyView(entry[0], keyCodec)
    this.value = new ValueView(entry[1], valueCodec)
  }

  decodeKey(): K {
    return this.key.decode()
  }

  decodeValue(): V {
    return this.value.decode()
  }

  decode(): [K, V] {
    return [this.key.decode(), this.value.decode()]
  }
}
