import { BaseError } from "../base-error"
import { toAppError } from "../to-app-error"

describe("toAppError", () => {
  it("returns a BaseError unchanged", () => {
    const err = new BaseError("original", { code: "original" })

    expect(toAppError(err)).toBe(err)
  })

  it("wraps an Error with the fallback code", () => {
    const cause = new Error("connection refused")
    const result = toAppError(cause, "transport_error")

    expect(result).toBeInstanceOf(BaseError)
    expect(result.code).toBe("transport_error")
    expect(result.message).toBe("connection refused")
    expect(result.cause).toBe(cause)
    expect(result.isOperational).toBe(false)
  })

  it("defaults the fallback code to unknown", () => {
    expect(toAppError(new Error("x")).code).toBe("unknown")
  })

  it("wraps a string with its text as the message", () => {
    const result = toAppError("refused")

    expect(result.message).toBe("refused")
    expect(result.context).toEqual({})
  })

  it("keeps other thrown values in context", () => {
    const result = toAppError(404)

    expect(result.message).toBe("Unknown error")
    expect(result.context).toEqual({ value: 404 })
  })
})
