import type { KeyType } from "../../../ports/key-type"
import { KeyspaceCache } from "../keyspace-cache"

function types(entries: Record<string, KeyType>): Map<string, KeyType> {
  return new Map(Object.entries(entries))
}

describe("KeyspaceCache", () => {
  let cache: KeyspaceCache

  beforeEach(() => {
    cache = new KeyspaceCache()
  })

  it("starts empty on the match-all pattern with a completed scan", () => {
    expect(cache.size).toBe(0)
    expect(cache.pattern).toBe("*")
    expect(cache.cursor).toBe("0")
    expect(cache.hasMore).toBe(false)
  })

  it("appends keys in discovery order and moves the cursor", () => {
    cache.merge(["b", "a"], types({ b: "string", a: "hash" }), "17")
    cache.merge(["c"], types({ c: "zset" }), "0")

    expect(cache.snapshot()).toEqual({
      keys: ["b", "a", "c"],
      types: types({ b: "string", a: "hash", c: "zset" }),
      cursor: "0",
      pattern: "*",
    })
  })

  it("ignores keys it already holds but takes their new type", () => {
    cache.merge(["a", "b"], types({ a: "string", b: "string" }), "5")
    cache.merge(["b", "a", "c"], types({ a: "list", c: "set" }), "9")

    const snapshot = cache.snapshot()
    expect(snapshot.keys).toEqual(["a", "b", "c"])
    expect(snapshot.types.get("a")).toBe("list")
    expect(cache.hasMore).toBe(true)
  })

  it("is unchanged by merging the same batch twice", () => {
    const batch = types({ x: "string", y: "hash" })
    cache.merge(["x", "y"], batch, "4")
    const first = cache.snapshot()

    cache.merge(["x", "y"], batch, "4")

    expect(cache.snapshot()).toEqual(first)
  })

  it("reset clears keys and cursor and keeps the pattern unless given one", () => {
    cache.reset("user:*")
    cache.merge(["user:1"], types({ "user:1": "hash" }), "3")

    cache.reset()
    expect(cache.pattern).toBe("user:*")
    expect(cache.size).toBe(0)
    expect(cache.cursor).toBe("0")

    cache.reset("*")
    expect(cache.pattern).toBe("*")
  })

  it("forget removes a key and its type", () => {
    cache.merge(["a", "b", "c"], types({ a: "string", b: "string", c: "string" }), "0")

    expect(cache.forget("b")).toBe(true)
    expect(cache.forget("b")).toBe(false)
    expect(cache.has("b")).toBe(false)
    expect(cache.typeOf("b")).toBeUndefined()
    expect(cache.snapshot().keys).toEqual(["a", "c"])
  })

  it("hands out snapshots the caller cannot change", () => {
    cache.merge(["a"], types({ a: "string" }), "0")
    const snapshot = cache.snapshot()

    const keys = [...snapshot.keys, "b"]

    expect(keys).toHaveLength(2)
    expect(cache.snapshot().keys).toEqual(["a"])
  })
})
