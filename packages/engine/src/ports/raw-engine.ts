import type { RawTransaction } from "./raw-transaction"
import type { RawTree } from "./raw-tree"

/**
 * Ordered, transactional, byte-oriented storage with named trees.
 */
export interface RawEngine {
  /** Short identifier used in logs. */
  readonly name: string
  readonly isClosed: boolean

  /**
   * Opens or creates a tree. Opening the same name again returns the same
   * handle.
   */
  openTree(name: string): RawTree

  /**
   * Deletes a tree with all of its entries. Handles to it stop working.
   */
  dropTree(name: string): boolean

  treeNames(): string[]

  /**
   * Monotonic identifiers, never reused within the engine's lifetime.
   */
  generateId(): number

  begin(trees: readonly RawTree[]): RawTransaction

  /**
   * Resolves once everything written so far is durable, with the number of
   * bytes this flush wrote.
   */
  flushAsync(): Promise<number>

  /**
   * Starts a flush in the background. Failures are logged, not thrown.
   */
  scheduleFlush(): void

  close(): Promise<void>
}
