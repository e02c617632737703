import type { RawEngine, RawTransaction, RawTree } from "@kvtree/engine"
import {
  TransactionConflictError,
  UnabortableTransactionError,
  UsageError,
} from "@kvtree/errors"
import type { Logger } from "@kvtree/logger"
import { isPromiseLike } from "./is-promise-like"

export type TransactionOptions = {
  /**
   * How many times a conflicting attempt is re-run before giving up with
   * `TransactionConflictError`. Unset retries until commit.
   */
  maxRetries?: number
}

export type ExecuteTransactionDeps = {
  engine: RawEngine
  logger: Logger
}

/**
 * Runs `attempt` in a fresh engine transaction until one commits.
 *
 * - A returned value commits and is returned.
 * - A conflict (reported by commit, or thrown as `TransactionConflictError`)
 *   rolls back and runs `attempt` again from scratch.
 * - Anything else thrown rolls back and propagates unchanged.
 */
export function executeTransaction<R>(
  deps: ExecuteTransactionDeps,
  trees: readonly RawTree[],
  opts: TransactionOptions,
  attempt: (tx: RawTransaction) => R,
): R {
  const names = trees.map((tree) => tree.name)
  const logger = deps.logger.child({ component: "transaction", trees: names })

  for (let attempts = 1; ; attempts++) {
    const tx = deps.engine.begin(trees)
    let conflict: TransactionConflictError | undefined

    try {
      const result = attempt(tx)

      if (isPromiseLike(result)) {
        result.then(undefined, (err: unknown) => {
          logger.warn("asynchronous transaction callback rejected after rollback", { err })
        })

        throw new UsageError("Transaction callbacks must be synchronous", {
          context: { trees: names },
        })
      }

      if (tx.commit().kind === "committed") return result
    } catch (err) {
      tx.rollback()

      if (!(err instanceof TransactionConflictError)) {
        if (err instanceof UnabortableTransactionError) {
          logger.error("transaction attempt aborted by an encoding failure", {
            attempt: attempts,
            err,
          })
        }

        throw err
      }

      conflict = err
    }

    tx.rollback()

    if (opts.maxRetries !== undefined && attempts > opts.maxRetries) {
      logger.warn("transaction retry limit exhausted", { attempts })

      throw new TransactionConflictError(
        `Transaction still conflicting after ${attempts} attempts`,
        {
          ...(conflict && { cause: conflict }),
          context: { trees: names, attempts },
        },
      )
    }

    logger.debug("transaction conflict, retrying", { attempt: attempts })
  }
}
