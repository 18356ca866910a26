import { BaseError } from "../../base-error"
import { toAppError } from "../to-app-error"

describe("toAppError", () => {
  it("passes BaseError through", () => {
    const err = new BaseError("x", { code: "scan_aborted" })

    expect(toAppError(err)).toBe(err)
  })

  it("wraps plain errors as non-operational with the original as cause", () => {
    const original = new Error("READONLY You can't write against a read only replica.")

    const wrapped = toAppError(original, "transport_failure")

    expect(wrapped).toBeInstanceOf(BaseError)
    expect(wrapped.code).toBe("transport_failure")
    expect(wrapped.message).toBe(original.message)
    expect(wrapped.cause).toBe(original)
    expect(wrapped.isOperational).toBe(false)
  })

  it("uses the string as message", () => {
    const wrapped = toAppError("boom")

    expect(wrapped.code).toBe("unknown")
    expect(wrapped.message).toBe("boom")
    expect(wrapped.context).toEqual({})
  })

  it("stores other values in context", () => {
    const wrapped = toAppError(42)

    expect(wrapped.message).toBe("Unknown error")
    expect(wrapped.context).toEqual({ value: 42 })
  })
})
