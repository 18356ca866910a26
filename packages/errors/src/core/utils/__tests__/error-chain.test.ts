import { BaseError } from "../../base-error"
import { errorChain } from "../error-chain"

describe("errorChain", () => {
  it("returns the error alone when it has no cause", () => {
    const err = new Error("solo")

    expect(errorChain(err)).toEqual([err])
  })

  it("walks nested causes outermost first", () => {
    const root = new Error("ECONNREFUSED")
    const middle = new BaseError("scan failed", { code: "transport_failure", cause: root })
    const outer = new Error("load failed", { cause: middle })

    expect(errorChain(outer)).toEqual([outer, middle, root])
  })

  it("includes non-error causes", () => {
    const err = new Error("wrapper", { cause: "ERR unknown command" })

    expect(errorChain(err)).toEqual([err, "ERR unknown command"])
  })

  it("stops on cycles", () => {
    const a: { message: string; cause?: unknown } = { message: "a" }
    const b = { message: "b", cause: a }
    a.cause = b

    expect(errorChain(a)).toEqual([a, b])
  })

  it("caps the depth", () => {
    let current = new Error("root")
    for (let i = 0; i < 99; i++) current = new Error(`level-${i}`, { cause: current })

    expect(errorChain(current, 5)).toHaveLength(5)
    expect(errorChain(current)).toHaveLength(50)
  })

  it("returns an empty chain for nullish input", () => {
    expect(errorChain(null)).toEqual([])
    expect(errorChain(undefined)).toEqual([])
  })
})
