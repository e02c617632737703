export { compareBytes } from "./core/bytes/compare-bytes"
export { prefixSuccessor } from "./core/bytes/prefix-successor"
export { copyBytes, toBytesKey } from "./core/bytes/bytes-key"
export {
  createMemoryEngine,
  MemoryEngine,
  type MemoryEngineDeps,
  type MemoryEngineOptions,
} from "./adapters/memory/memory-engine"
export {
  fullRange,
  type RawBatchOp,
  type RawBound,
  type RawBytes,
  type RawEntry,
  type RawRange,
  unbounded,
} from "./ports/raw-bytes"
export type { RawCursor } from "./ports/raw-cursor"
export type { RawEngine } from "./ports/raw-engine"
export type {
  RawCommitOutcome,
  RawTransaction,
  RawTransactionalTree,
} from "./ports/raw-transaction"
export type { RawTree } from "./ports/raw-tree"
