import { StorageError, UsageError } from "@kvtree/errors"
import { copyBytes, toBytesKey } from "../../core/bytes/bytes-key"
import type { RawBatchOp, RawBytes } from "../../ports/raw-bytes"
import type {
  RawCommitOutcome,
  RawTransaction,
  RawTransactionalTree,
} from "../../ports/raw-transaction"
import type { RawTree } from "../../ports/raw-tree"
import type { MemoryTree, StagedWrite } from "./memory-tree"

/**
 * What a transaction needs from the engine that began it.
 */
export interface MemoryTransactionHost {
  ensureOpen(): void
  generateId(): number
  scheduleFlush(): void
}

type ReadRecord = {
  readonly key: RawBytes
  readonly version: number | undefined
}

type AttemptState = "active" | "committed" | "rolled_back"

/**
 * Optimistic transaction: reads remember the version they saw, writes are
 * staged per tree, and commit validates every read before applying all
 * staged writes in one synchronous step.
 */
export class MemoryTransaction implements RawTransaction {
  private state: AttemptState = "active"
  private flushOnCommit = false
  private readonly views = new Map<RawTree, MemoryTransactionalTree>()

  constructor(
    private readonly host: MemoryTransactionHost,
    trees: readonly MemoryTree[],
  ) {
    for (const tree of trees) {
      if (!this.views.has(tree)) {
        this.views.set(tree, new MemoryTransactionalTree(tree, () => this.ensureActive()))
      }
    }
  }

  get active(): boolean {
    return this.state === "active"
  }

  treeFor(tree: RawTree): RawTransactionalTree {
    this.ensureActive()

    const view = this.views.get(tree)

    if (!view) {
      throw new StorageError(`Tree "${tree.name}" is not part of this transaction`, {
        context: { tree: tree.name },
      })
    }

    return view
  }

  commit(): RawCommitOutcome {
    this.ensureActive()
    this.host.ensureOpen()

    const views = [...this.views.values()]

    if (views.some((view) => !view.readsAreCurrent())) {
      this.state = "rolled_back"
      return { kind: "conflict" }
    }

    try {
      for (const view of views) view.checkCapacity()
    } catch (err) {
      this.state = "rolled_back"
      throw err
    }

    for (const view of views) view.apply()

    this.state = "committed"

    if (this.flushOnCommit) this.host.scheduleFlush()

    return { kind: "committed" }
  }

  rollback(): void {
    if (this.state === "active") this.state = "rolled_back"
  }

  generateId(): number {
    this.ensureActive()

    return this.host.generateId()
  }

  scheduleFlush(): void {
    this.ensureActive()
    this.flushOnCommit = true
  }

  private ensureActive(): void {
    if (this.state !== "active") {
      throw new UsageError(`Transaction already ${this.state.replace("_", " ")}`)
    }
  }
}

export class MemoryTransactionalTree implements RawTransactionalTree {
  private readonly writes = new Map<string, StagedWrite>()
  private readonly reads = new Map<string, ReadRecord>()

  constructor(
    private readonly tree: MemoryTree,
    private readonly ensureActive: () => void,
  ) {}

  get name(): string {
    return this.tree.name
  }

  get(key: RawBytes): RawBytes | undefined {
    this.ensureActive()

    return this.read(key, toBytesKey(key))
  }

  insert(key: RawBytes, value: RawBytes): RawBytes | undefined {
    this.ensureActive()

    const id = toBytesKey(key)
    const previous = this.read(key, id)
    this.writes.set(id, { key: copyBytes(key), value: copyBytes(value) })

    return previous
  }

  remove(key: RawBytes): RawBytes | undefined {
    this.ensureActive()

    const id = toBytesKey(key)
    const previous = this.read(key, id)
    this.writes.set(id, { key: copyBytes(key), value: undefined })

    return previous
  }

  applyBatch(ops: readonly RawBatchOp[]): void {
    this.ensureActive()

    for (const op of ops) {
      this.writes.set(toBytesKey(op.key), {
        key: copyBytes(op.key),
        value: op.kind === "insert" ? copyBytes(op.value) : undefined,
      })
    }
  }

  readsAreCurrent(): boolean {
    for (const read of this.reads.values()) {
      if (this.tree.versionOf(read.key) !== read.version) return false
    }

    return true
  }

  checkCapacity(): void {
    this.tree.checkStaged([...this.writes.values()])
  }

  apply(): void {
    this.tree.applyStaged([...this.writes.values()])
  }

  private read(key: RawBytes, id: string): RawBytes | undefined {
    const staged = this.writes.get(id)

    if (staged) return staged.value && copyBytes(staged.value)

    if (!this.reads.has(id)) {
      this.reads.set(id, { key: copyBytes(key), version: this.tree.versionOf(key) })
    }

    return this.tree.get(key)
  }
}
