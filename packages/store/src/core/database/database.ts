import type { RawEngine } from "@kvtree/engine"
import { UsageError } from "@kvtree/errors"
import { createNullLogger, type Logger } from "@kvtree/logger"
import type { Entry } from "../../ports/entry"
import { bindCodec } from "../codec/bind-codec"
import type { TransactionOptions } from "../transaction/execute-transaction"
import {
  type AnyTree,
  runTransaction,
  type TransactionalViews,
} from "../transaction/run-transaction"
import { guard } from "../tree/guard"
import { Tree } from "../tree/tree"

export const DEFAULT_INLINE_BUFFER_BYTES = 64

export type DatabaseDeps = {
  engine: RawEngine
  logger?: Logger
}

export type DatabaseOptions = {
  /**
   * Capacity of each codec's inline encode buffer. Larger encodings still
   * work; they just allocate.
   */
  inlineBufferBytes?: number

  /**
   * Default conflict retry limit for transactions. Unset retries until
   * commit.
   */
  maxTransactionRetries?: number
}

export class Database {
  private readonly logger: Logger

  constructor(
    private readonly deps: DatabaseDeps,
    private readonly opts: DatabaseOptions = {},
  ) {
    this.logger = (deps.logger ?? createNullLogger()).child({
      component: "database",
      engine: deps.engine.name,
    })
  }

  openTree<K, V>(name: string, entry: Entry<K, V>): Tree<K, V> {
    const raw = guard(name, "openTree", () => this.deps.engine.openTree(name))
    const codecOptions = {
      inlineBufferBytes: this.opts.inlineBufferBytes ?? DEFAULT_INLINE_BUFFER_BYTES,
    }

    this.logger.debug("tree opened", { tree: name })

    return new Tree(
      {
        engine: this.deps.engine,
        raw,
        keyCodec: bindCodec(entry.key, { tree: name, part: "key" }, codecOptions),
        valueCodec: bindCodec(entry.value, { tree: name, part: "value" }, codecOptions),
        logger: this.logger.child({ tree: name }),
      },
      {
        ...(this.opts.maxTransactionRetries !== undefined && {
          maxTransactionRetries: this.opts.maxTransactionRetries,
        }),
      },
    )
  }

  dropTree(name: string): boolean {
    const dropped = guard(name, "dropTree", () => this.deps.engine.dropTree(name))

    if (dropped) this.logger.debug("tree dropped", { tree: name })

    return dropped
  }

  treeNames(): string[] {
    return this.deps.engine.treeNames()
  }

  /**
   * Monotonic across the database's lifetime; suitable as a synthetic key.
   */
  generateId(): number {
    return this.deps.engine.generateId()
  }

  async flushAsync(): Promise<number> {
    return await this.deps.engine.flushAsync()
  }

  /**
   * Runs `fn` atomically over `trees`; see `runTransaction`.
   */
  transaction<T extends readonly [AnyTree, ...AnyTree[]], R>(
    trees: T,
    fn: (views: TransactionalViews<T>) => R,
    options: TransactionOptions = {},
  ): R {
    const foreign = trees.find((tree) => tree.engine !== this.deps.engine)

    if (foreign) {
      throw new UsageError(`Tree "${foreign.name}" belongs to another database`, {
        context: { tree: foreign.name },
      })
    }

    const maxRetries = options.maxRetries ?? this.opts.maxTransactionRetries

    return runTransaction(trees, fn, { ...(maxRetries !== undefined && { maxRetries }) })
  }

  async close(): Promise<void> {
    await this.deps.engine.close()

    this.logger.debug("database closed")
  }
}

export function createDatabase(deps: DatabaseDeps, opts: DatabaseOptions = {}): Database {
  return new Database(deps, opts)
}
