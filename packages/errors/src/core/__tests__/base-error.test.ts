import { BaseError } from "../base-error"

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2025-03-02T08:00:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("applies defaults", () => {
    const err = new BaseError("scan failed", { code: "transport_failure" })

    expect(err.message).toBe("scan failed")
    expect(err.code).toBe("transport_failure")
    expect(err.name).toBe("BaseError")
    expect(err.context).toEqual({})
    expect(err.isRetryable).toBe(false)
    expect(err.isOperational).toBe(true)
    expect(err.timestamp).toEqual(new Date("2025-03-02T08:00:00.000Z"))
  })

  it("keeps explicit options", () => {
    const cause = new Error("ECONNRESET")
    const err = new BaseError("scan failed", {
      code: "transport_failure",
      context: { cursor: "17", pattern: "user:*" },
      cause,
      isRetryable: true,
      isOperational: false,
    })

    expect(err.context).toEqual({ cursor: "17", pattern: "user:*" })
    expect(err.cause).toBe(cause)
    expect(err.isRetryable).toBe(true)
    expect(err.isOperational).toBe(false)
  })

  it("freezes a copy of the context", () => {
    const context = { key: "a" }
    const err = new BaseError("x", { code: "x", context })
    context.key = "b"

    expect(Object.isFrozen(err.context)).toBe(true)
    expect(err.context).toEqual({ key: "a" })
  })

  it("names subclasses after the constructor", () => {
    class ScanError extends BaseError<"scan"> {
      constructor() {
        super("scan", { code: "scan" })
      }
    }

    const err = new ScanError()

    expect(err.name).toBe("ScanError")
    expect(err).toBeInstanceOf(BaseError)
    expect(err).toBeInstanceOf(Error)
  })

  it("serializes through toJSON", () => {
    const err = new BaseError("bad page size", { code: "invalid_argument", context: { minCount: 0 } })

    expect(JSON.parse(JSON.stringify(err))).toEqual({
      name: "BaseError",
      code: "invalid_argument",
      message: "bad page size",
      context: { minCount: 0 },
      isRetryable: false,
      isOperational: true,
      timestamp: "2025-03-02T08:00:00.000Z",
    })
  })
})
