export { loadStoreConfig, type StoreConfig } from "./config/load-store-config"
export { type StoreEnv, storeEnvSchema } from "./config/schema"
export { utf8Codec } from "./core/codec/utf8-codec"
export {
  createDatabase,
  Database,
  type DatabaseDeps,
  type DatabaseOptions,
  DEFAULT_INLINE_BUFFER_BYTES,
} from "./core/database/database"
export { defineEntry } from "./core/entry/define-entry"
export { excluded, included, unbounded } from "./core/range/to-raw-range"
export type { TransactionOptions } from "./core/transaction/execute-transaction"
export {
  type AnyTree,
  runTransaction,
  type TransactionalViews,
} from "./core/transaction/run-transaction"
export { TransactionalTree } from "./core/transaction/transactional-tree"
export { Batch } from "./core/tree/batch"
export { ProjectedIterator } from "./core/tree/projected-iterator"
export { Tree, type TreeOptions } from "./core/tree/tree"
export { TreeIterator } from "./core/tree/tree-iterator"
export { KeyValueView, KeyView, ValueView } from "./core/views/views"
export type { Codec } from "./ports/codec"
export type { CodecSource, Entry, KeyOf, ValueOf } from "./ports/entry"
export type { EntryCodec } from "./ports/entry-codec"
export type { Bound, KeyRange } from "./ports/key-range"
export type { TreeFound, TreeNotFound, TreeResult } from "./ports/tree-result"
