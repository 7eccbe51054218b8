import { BaseError } from "../../base-error"
import { isAppError } from "../is-app-error"

describe("isAppError", () => {
  const shape = {
    name: "ForeignError",
    message: "from another copy",
    code: "foreign",
    context: {},
    isRetryable: false,
    isOperational: true,
    timestamp: new Date("2025-03-02T08:00:00.000Z"),
  }

  it("accepts BaseError", () => {
    expect(isAppError(new BaseError("x", { code: "test" }))).toBe(true)
  })

  it("accepts a structurally matching object", () => {
    expect(isAppError(shape)).toBe(true)
  })

  it.each([null, undefined, "error", 500, new Error("plain")])("rejects %s", (value) => {
    expect(isAppError(value)).toBe(false)
  })

  it("rejects an object with an invalid timestamp", () => {
    expect(isAppError({ ...shape, timestamp: new Date(Number.NaN) })).toBe(false)
  })

  it("rejects an object without a code", () => {
    const { code: _code, ...rest } = shape

    expect(isAppError(rest)).toBe(false)
  })
})
