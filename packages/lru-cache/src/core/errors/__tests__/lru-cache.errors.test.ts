import { BaseError } from "@tidemark/errors"
import { EvictionStalledError, InvalidArgumentError } from "../lru-cache.errors"

describe("InvalidArgumentError", () => {
  it("capacity() describes the rejected value", () => {
    const err = InvalidArgumentError.capacity(-2, ["Too small"])

    expect(err).toBeInstanceOf(BaseError)
    expect(err.name).toBe("InvalidArgumentError")
    expect(err.message).toBe("capacity must be a positive integer, got: -2")
    expect(err.context).toEqual({ argument: "capacity", value: -2, issues: ["Too small"] })
    expect(err.isOperational).toBe(true)
  })

  it("options() keeps the detail in the message", () => {
    const err = InvalidArgumentError.options("✖ bad")

    expect(err.message).toBe("Invalid cache options:\n✖ bad")
    expect(err.context).toEqual({ argument: "options" })
  })

  it("serializes to JSON", () => {
    const json = InvalidArgumentError.nonEmptyStore(3).toJSON()

    expect(json).toMatchObject({
      name: "InvalidArgumentError",
      code: "invalid_argument",
      message: "store must be empty, it holds 3 entries",
      context: { argument: "store", size: 3 },
    })
  })
})

describe("EvictionStalledError", () => {
  it("refilled() names the operation and the counts", () => {
    const err = EvictionStalledError.refilled("resize", { evicted: 3, size: 3, capacity: 1 })

    expect(err).toBeInstanceOf(BaseError)
    expect(err.name).toBe("EvictionStalledError")
    expect(err.code).toBe("eviction_stalled")
    expect(err.message).toBe(
      "resize stopped after 3 evictions: listeners refilled the cache to 3/1",
    )
    expect(err.context).toEqual({ operation: "resize", evicted: 3, size: 3, capacity: 1 })
    expect(err.isRetryable).toBe(false)
  })
})
