import type { RawEngine, RawTransaction, RawTree } from "@kvtree/engine"
import { TransactionConflictError, UsageError } from "@kvtree/errors"
import type { Logger } from "@kvtree/logger"
import { mock } from "vitest-mock-extended"
import type { Mock } from "../../../tests/mock"
import { executeTransaction } from "../execute-transaction"

describe("executeTransaction", () => {
  let engine: Mock<RawEngine>
  let tx: Mock<RawTransaction>
  let tree: Mock<RawTree>
  let logger: Mock<Logger>

  beforeEach(() => {
    engine = mock<RawEngine>()
    tx = mock<RawTransaction>()
    tree = mock<RawTree>({ name: "people" })
    logger = mock<Logger>()

    engine.begin.mockReturnValue(tx)
    logger.child.mockReturnValue(logger)
  })

  const run = <R>(attempt: (tx: RawTransaction) => R, maxRetries?: number) =>
    executeTransaction(
      { engine, logger },
      [tree],
      { ...(maxRetries !== undefined && { maxRetries }) },
      attempt,
    )

  it("commits a single attempt", () => {
    tx.commit.mockReturnValue({ kind: "committed" })

    expect(run(() => 42)).toBe(42)
    expect(engine.begin).toHaveBeenCalledExactlyOnceWith([tree])
    expect(tx.rollback).not.toHaveBeenCalled()
    expect(logger.child).toHaveBeenCalledExactlyOnceWith({
      component: "transaction",
      trees: ["people"],
    })
  })

  it("starts a fresh attempt after a conflicting commit", () => {
    tx.commit.mockReturnValueOnce({ kind: "conflict" }).mockReturnValueOnce({ kind: "committed" })
    const attempt = vi.fn(() => "ok")

    expect(run(attempt)).toBe("ok")
    expect(attempt).toHaveBeenCalledTimes(2)
    expect(engine.begin).toHaveBeenCalledTimes(2)
    expect(logger.debug).toHaveBeenCalledExactlyOnceWith("transaction conflict, retrying", {
      attempt: 1,
    })
  })

  it("throws once the retry limit is exhausted", () => {
    tx.commit.mockReturnValue({ kind: "conflict" })

    try {
      run(() => undefined, 1)
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(TransactionConflictError)
      expect(err).toMatchObject({ context: { trees: ["people"], attempts: 2 } })
      expect(err instanceof Error && err.cause).toBeUndefined()
    }

    expect(logger.warn).toHaveBeenCalledExactlyOnceWith("transaction retry limit exhausted", {
      attempts: 2,
    })
  })

  it("rolls back and rethrows anything but a conflict", () => {
    const boom = new Error("boom")

    expect(() =>
      run(() => {
        throw boom
      }),
    ).toThrow(boom)
    expect(tx.rollback).toHaveBeenCalled()
    expect(tx.commit).not.toHaveBeenCalled()
    expect(engine.begin).toHaveBeenCalledOnce()
  })

  it("propagates commit failures without retrying", () => {
    const full = new Error("full")
    tx.commit.mockImplementation(() => {
      throw full
    })

    expect(() => run(() => 1)).toThrow(full)
    expect(engine.begin).toHaveBeenCalledOnce()
  })

  it("rejects a promise-returning attempt and reports its late rejection", async () => {
    const late = new Error("late")

    expect(() => run(() => Promise.reject(late))).toThrow(UsageError)
    expect(tx.commit).not.toHaveBeenCalled()
    expect(tx.rollback).toHaveBeenCalled()

    await vi.waitFor(() => {
      expect(logger.warn).toHaveBeenCalledExactlyOnceWith(
        "asynchronous transaction callback rejected after rollback",
        { err: late },
      )
    })
  })
})
