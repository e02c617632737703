import { UsageError } from "@kvtree/errors"
import type { Tree } from "../tree/tree"
import { executeTransaction, type TransactionOptions } from "./execute-transaction"
import type { TransactionalTree } from "./transactional-tree"

export type AnyTree = Tree<unknown, unknown>

/**
 * One transactional view per tree, same order and arity.
 */
export type TransactionalViews<T extends readonly AnyTree[]> = {
  [I in keyof T]: T[I] extends Tree<infer K, infer V> ? TransactionalTree<K, V> : never
}

/**
 * Runs `fn` atomically over several trees of one database.
 *
 * `fn` may run more than once (after conflicts), so it must not have side
 * effects outside the views it receives. Throwing from `fn` rolls back and
 * rethrows the same value.
 *
 * @example
 * ```ts
 * const id = runTransaction([people, accounts], ([p, a]) => {
 *   const id = a.generateId()
 *   p.insert("ann", { name: "Ann", age: 34 })
 *   a.insert(id, { owner: "ann" })
 *   return id
 * })
 * ```
 */
export function runTransaction<T extends readonly [AnyTree, ...AnyTree[]], R>(
  trees: T,
  fn: (views: TransactionalViews<T>) => R,
  options: TransactionOptions = {},
): R {
  const [first] = trees

  if (trees.length === 0) {
    throw new UsageError("A transaction needs at least one tree")
  }

  if (trees.some((tree) => tree.engine !== first.engine)) {
    throw new UsageError("Trees of one transaction must belong to the same database", {
      context: { trees: trees.map((tree) => tree.name) },
    })
  }

  const maxRetries = options.maxRetries ?? first.defaultMaxRetries

  return executeTransaction(
    { engine: first.engine, logger: first.logger },
    trees.map((tree) => tree.raw),
    { ...(maxRetries !== undefined && { maxRetries }) },
    (tx) => {
      const views = trees.map((tree) => tree.attach(tx))

      return fn(views as unknown as TransactionalViews<T>)
    },
  )
}
