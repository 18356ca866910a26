import { filterKeys } from "../local-filter"

describe("filterKeys", () => {
  const keys = ["user:1", "User:Profile", "session:abc", "orders"]

  it("returns the same array for empty text", () => {
    expect(filterKeys(keys, "")).toBe(keys)
  })

  it("matches substrings ignoring case", () => {
    expect(filterKeys(keys, "USER")).toEqual(["user:1", "User:Profile"])
    expect(filterKeys(keys, "s:a")).toEqual(["session:abc"])
  })

  it("keeps the input order", () => {
    expect(filterKeys(["b:x", "a:x", "c:y"], "x")).toEqual(["b:x", "a:x"])
  })

  it("does not treat glob characters specially", () => {
    expect(filterKeys(["a*b", "ab"], "*")).toEqual(["a*b"])
  })
})
