import { DecodeError, StorageError } from "../../errors"
import { toStorageError } from "../to-storage-error"

describe("toStorageError", () => {
  it("passes taxonomy errors through unchanged", () => {
    const err = new DecodeError("bad bytes")

    expect(toStorageError(err)).toBe(err)
  })

  it("wraps plain errors with their message and cause", () => {
    const cause = new Error("EIO")
    const out = toStorageError(cause, { tree: "people" })

    expect(out).toBeInstanceOf(StorageError)
    expect(out.message).toBe("EIO")
    expect(out.cause).toBe(cause)
    expect(out.context).toStrictEqual({ tree: "people" })
  })

  it("wraps thrown strings and other values", () => {
    expect(toStorageError("disk full").message).toBe("disk full")
    expect(toStorageError(7).message).toBe("Unknown engine failure")
  })
})
