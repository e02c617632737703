import { StorageError, UsageError } from "@kvtree/errors"
import type { Logger } from "@kvtree/logger"
import { mock } from "vitest-mock-extended"
import { fullRange } from "../../../ports/raw-bytes"
import { drain, text, utf8 } from "../../../tests/bytes"
import type { Mock } from "../../../tests/mock"
import { MemoryEngine } from "../memory-engine"

describe("MemoryEngine behavior", () => {
  describe("capacity", () => {
    it("rejects an insert of a new key beyond maxEntriesPerTree", () => {
      const engine = new MemoryEngine({}, { maxEntriesPerTree: 2 })
      const tree = engine.openTree("t")

      tree.insert(utf8("a"), utf8("1"))
      tree.insert(utf8("b"), utf8("2"))

      expect(() => tree.insert(utf8("c"), utf8("3"))).toThrow(StorageError)
      expect(text(tree.insert(utf8("a"), utf8("9")))).toBe("1")
      expect(tree.len()).toBe(2)
    })

    it("leaves the tree unchanged when a batch would exceed capacity", () => {
      const engine = new MemoryEngine({}, { maxEntriesPerTree: 2 })
      const tree = engine.openTree("t")

      tree.insert(utf8("a"), utf8("1"))

      expect(() =>
        tree.applyBatch([
          { kind: "insert", key: utf8("a"), value: utf8("changed") },
          { kind: "insert", key: utf8("b"), value: utf8("2") },
          { kind: "insert", key: utf8("c"), value: utf8("3") },
        ]),
      ).toThrow(StorageError)

      expect(drain(tree.range(fullRange))).toEqual(["a=1"])
    })

    it("counts removals within the same batch", () => {
      const engine = new MemoryEngine({}, { maxEntriesPerTree: 2 })
      const tree = engine.openTree("t")

      tree.insert(utf8("a"), utf8("1"))
      tree.insert(utf8("b"), utf8("2"))

      tree.applyBatch([
        { kind: "remove", key: utf8("a") },
        { kind: "insert", key: utf8("c"), value: utf8("3") },
      ])

      expect(drain(tree.range(fullRange))).toEqual(["b=2", "c=3"])
    })

    it("applies nothing when one tree of a commit would exceed capacity", () => {
      const engine = new MemoryEngine({}, { maxEntriesPerTree: 1 })
      const left = engine.openTree("left")
      const right = engine.openTree("right")

      right.insert(utf8("taken"), utf8("x"))

      const tx = engine.begin([left, right])
      tx.treeFor(left).insert(utf8("a"), utf8("1"))
      tx.treeFor(right).insert(utf8("b"), utf8("2"))

      expect(() => tx.commit()).toThrow(StorageError)
      expect(left.isEmpty()).toBe(true)
      expect(right.len()).toBe(1)
      expect(tx.active).toBe(false)
    })

    it("rejects opening more than maxTrees trees", () => {
      const engine = new MemoryEngine({}, { maxTrees: 1 })

      engine.openTree("one")

      expect(() => engine.openTree("two")).toThrow(StorageError)
      expect(() => engine.openTree("one")).not.toThrow()
    })
  })

  describe("returned bytes", () => {
    it("hands out copies from point reads and tree ends", () => {
      const engine = new MemoryEngine()
      const tree = engine.openTree("t")
      tree.insert(utf8("a"), utf8("1"))

      tree.get(utf8("a"))?.fill(0x7a)
      tree.first()?.[1].fill(0x7a)
      tree.last()?.[0].fill(0x7a)

      expect(text(tree.get(utf8("a")))).toBe("1")
      expect(drain(tree.range(fullRange))).toStrictEqual(["a=1"])
    })

    it("hands out copies from cursors", () => {
      const engine = new MemoryEngine()
      const tree = engine.openTree("t")
      tree.insert(utf8("a"), utf8("1"))

      const entry = tree.range(fullRange).next()
      entry?.[0].fill(0x7a)
      entry?.[1].fill(0x7a)

      expect(drain(tree.range(fullRange))).toStrictEqual(["a=1"])
    })

    it("hands out copies inside a transaction, staged writes included", () => {
      const engine = new MemoryEngine()
      const tree = engine.openTree("t")
      tree.insert(utf8("a"), utf8("1"))

      const tx = engine.begin([tree])
      const view = tx.treeFor(tree)
      view.get(utf8("a"))?.fill(0x7a)
      view.insert(utf8("b"), utf8("2"))
      view.get(utf8("b"))?.fill(0x7a)

      expect(text(view.get(utf8("b")))).toBe("2")
      tx.rollback()

      expect(drain(tree.range(fullRange))).toStrictEqual(["a=1"])
    })
  })

  describe("transactions", () => {
    it("requires at least one tree", () => {
      const engine = new MemoryEngine()

      expect(() => engine.begin([])).toThrow(UsageError)
    })

    it("rejects trees from another engine", () => {
      const engine = new MemoryEngine()
      const other = new MemoryEngine()

      engine.openTree("t")

      expect(() => engine.begin([other.openTree("t")])).toThrow(StorageError)
    })

    it("accepts the same tree twice and shares its staged writes", () => {
      const engine = new MemoryEngine()
      const tree = engine.openTree("t")

      const tx = engine.begin([tree, tree])
      tx.treeFor(tree).insert(utf8("a"), utf8("1"))

      expect(text(tx.treeFor(tree).get(utf8("a")))).toBe("1")
      expect(tx.commit()).toStrictEqual({ kind: "committed" })
      expect(tree.len()).toBe(1)
    })

    it("fails the commit when a participating tree was dropped", () => {
      const engine = new MemoryEngine()
      const tree = engine.openTree("t")

      const tx = engine.begin([tree])
      tx.treeFor(tree).get(utf8("a"))

      engine.dropTree("t")

      expect(() => tx.commit()).toThrow(StorageError)
    })

    it("flushes only after a commit that asked for it", async () => {
      const engine = new MemoryEngine()
      const tree = engine.openTree("t")
      const flush = vi.spyOn(engine, "scheduleFlush")

      const rolledBack = engine.begin([tree])
      rolledBack.scheduleFlush()
      rolledBack.rollback()

      expect(flush).not.toHaveBeenCalled()

      const committed = engine.begin([tree])
      committed.treeFor(tree).insert(utf8("a"), utf8("1"))
      committed.scheduleFlush()
      committed.commit()

      expect(flush).toHaveBeenCalledOnce()

      await expect(engine.flushAsync()).resolves.toBe(2)
    })
  })

  describe("cursors", () => {
    it("observes writes made between steps", () => {
      const engine = new MemoryEngine()
      const tree = engine.openTree("t")

      tree.insert(utf8("a"), utf8("1"))
      tree.insert(utf8("c"), utf8("3"))

      const cursor = tree.range(fullRange)

      expect(text(cursor.next()?.[0])).toBe("a")

      tree.insert(utf8("b"), utf8("2"))
      tree.remove(utf8("c"))

      expect(text(cursor.next()?.[0])).toBe("b")
      expect(cursor.next()).toBeUndefined()
    })

    it("stays exhausted once it returned undefined", () => {
      const engine = new MemoryEngine()
      const tree = engine.openTree("t")
      const cursor = tree.range(fullRange)

      expect(cursor.next()).toBeUndefined()

      tree.insert(utf8("a"), utf8("1"))

      expect(cursor.next()).toBeUndefined()
      expect(cursor.nextBack()).toBeUndefined()
    })

    it("does not depend on the caller keeping bound bytes intact", () => {
      const engine = new MemoryEngine()
      const tree = engine.openTree("t")

      tree.insert(utf8("a"), utf8("1"))
      tree.insert(utf8("b"), utf8("2"))

      const start = utf8("b")
      const cursor = tree.range({
        start: { kind: "included", key: start },
        end: { kind: "unbounded" },
      })
      start[0] = 0x61

      expect(drain(cursor)).toEqual(["b=2"])
    })
  })

  describe("flushing", () => {
    it("lets concurrent callers share one flush", async () => {
      const engine = new MemoryEngine()
      const tree = engine.openTree("t")

      tree.insert(utf8("key"), utf8("value"))

      const [first, second] = await Promise.all([engine.flushAsync(), engine.flushAsync()])

      expect(first).toBe(8)
      expect(second).toBe(8)
      await expect(engine.flushAsync()).resolves.toBe(0)
    })

    it("counts removed keys and cleared trees as written bytes", async () => {
      const engine = new MemoryEngine()
      const tree = engine.openTree("t")

      tree.insert(utf8("ab"), utf8("1"))
      tree.insert(utf8("cd"), utf8("2"))
      await engine.flushAsync()

      tree.remove(utf8("ab"))
      tree.clear()

      await expect(engine.flushAsync()).resolves.toBe(4)
    })

    it("logs a scheduled flush that fails", async () => {
      const logger: Mock<Logger> = mock<Logger>()
      logger.child.mockReturnValue(logger)

      const engine = new MemoryEngine({ logger })
      await engine.close()

      engine.scheduleFlush()

      await vi.waitFor(() => {
        expect(logger.error).toHaveBeenCalledWith(
          "scheduled flush failed",
          expect.objectContaining({ operation: "flush", err: expect.any(StorageError) }),
        )
      })
    })

    it("scopes its logger to the engine", () => {
      const logger: Mock<Logger> = mock<Logger>()
      logger.child.mockReturnValue(logger)

      const engine = new MemoryEngine({ logger })
      engine.openTree("people")

      expect(logger.child).toHaveBeenCalledExactlyOnceWith({ engine: "memory" })
      expect(logger.debug).toHaveBeenCalledWith("tree opened", { tree: "people" })
    })
  })
})
