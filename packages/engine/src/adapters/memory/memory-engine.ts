import { StorageError, UsageError } from "@kvtree/errors"
import { createNullLogger, type Logger } from "@kvtree/logger"
import type { RawEngine } from "../../ports/raw-engine"
import type { RawTransaction } from "../../ports/raw-transaction"
import type { RawTree } from "../../ports/raw-tree"
import { FlushBarrier } from "./flush-barrier"
import { MemoryTransaction, type MemoryTransactionHost } from "./memory-transaction"
import { MemoryTree, type MemoryTreeHost } from "./memory-tree"

export type MemoryEngineOptions = {
  /**
   * Maximum number of entries per tree. Writes that would exceed it throw a
   * `StorageError` and leave the tree unchanged.
   */
  maxEntriesPerTree?: number

  /**
   * Maximum number of open trees.
   */
  maxTrees?: number
}

export type MemoryEngineDeps = {
  logger?: Logger
}

/**
 * Ordered in-memory engine. "Durable" means counted by the last flush.
 */
export class MemoryEngine implements RawEngine, MemoryTreeHost, MemoryTransactionHost {
  readonly name = "memory"

  private readonly trees = new Map<string, MemoryTree>()
  private readonly barrier = new FlushBarrier(() => this.drainDirty())
  private readonly logger: Logger

  private version = 0
  private nextId = 0
  private dirtyBytes = 0
  private closed = false

  constructor(
    deps: MemoryEngineDeps = {},
    private readonly opts: MemoryEngineOptions = {},
  ) {
    this.logger = (deps.logger ?? createNullLogger()).child({ engine: this.name })
  }

  get isClosed(): boolean {
    return this.closed
  }

  get maxEntriesPerTree(): number | undefined {
    return this.opts.maxEntriesPerTree
  }

  openTree(name: string): RawTree {
    this.ensureOpen()

    const existing = this.trees.get(name)
    if (existing) return existing

    if (this.opts.maxTrees !== undefined && this.trees.size >= this.opts.maxTrees) {
      throw new StorageError(`Engine would exceed ${this.opts.maxTrees} trees`, {
        context: { tree: name, maxTrees: this.opts.maxTrees },
      })
    }

    const tree = new MemoryTree(this, name)
    this.trees.set(name, tree)

    this.logger.debug("tree opened", { tree: name })

    return tree
  }

  dropTree(name: string): boolean {
    this.ensureOpen()

    const tree = this.trees.get(name)
    if (!tree) return false

    tree.clear()
    tree.markDropped()
    this.trees.delete(name)

    this.logger.debug("tree dropped", { tree: name })

    return true
  }

  treeNames(): string[] {
    this.ensureOpen()

    return [...this.trees.keys()].sort()
  }

  generateId(): number {
    this.ensureOpen()

    return this.nextId++
  }

  begin(trees: readonly RawTree[]): RawTransaction {
    this.ensureOpen()

    if (trees.length === 0) {
      throw new UsageError("A transaction needs at least one tree")
    }

    return new MemoryTransaction(
      this,
      trees.map((tree) => this.own(tree)),
    )
  }

  async flushAsync(): Promise<number> {
    this.ensureOpen()

    const startedAt = performance.now()
    const bytes = await this.barrier.run()

    this.logger.debug("flushed", {
      operation: "flush",
      bytes,
      durationMs: performance.now() - startedAt,
    })

    return bytes
  }

  scheduleFlush(): void {
    this.flushAsync().catch((err: unknown) => {
      this.logger.error("scheduled flush failed", { operation: "flush", err })
    })
  }

  async close(): Promise<void> {
    if (this.closed) return

    await this.flushAsync()

    this.closed = true
    this.trees.clear()

    this.logger.debug("engine closed")
  }

  ensureOpen(): void {
    if (this.closed) {
      throw new StorageError("Engine is closed", { context: { engine: this.name } })
    }
  }

  nextVersion(): number {
    return ++this.version
  }

  recordWrite(bytes: number): void {
    this.dirtyBytes += bytes
  }

  private drainDirty(): number {
    const bytes = this.dirtyBytes
    this.dirtyBytes = 0

    return bytes
  }

  private own(tree: RawTree): MemoryTree {
    const owned = this.trees.get(tree.name)

    if (owned !== tree || !(tree instanceof MemoryTree)) {
      throw new StorageError(`Tree "${tree.name}" does not belong to this engine`, {
        context: { tree: tree.name },
      })
    }

    return tree
  }
}

export function createMemoryEngine(
  deps: MemoryEngineDeps = {},
  opts: MemoryEngineOptions = {},
): MemoryEngine {
  return new MemoryEngine(deps, opts)
}
