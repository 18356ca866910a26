import { TransportError } from "../../../core/errors/keyspace-errors"
import { MemoryKeyspaceDataSource } from "../memory-data-source"

describe("MemoryKeyspaceDataSource behavior", () => {
  let source: MemoryKeyspaceDataSource

  beforeEach(async () => {
    source = new MemoryKeyspaceDataSource({ scanWorkLimit: 2 })
    await source.connect()
  })

  describe("scan", () => {
    it("returns empty pages when the examined keys do not match", async () => {
      await source.setString("a:1", "x")
      await source.setString("a:2", "x")
      await source.setString("b:1", "x")

      const first = await source.scan("0", "b:*", 100)
      expect(first.keys).toEqual([])
      expect(first.cursor).not.toBe("0")

      const second = await source.scan(first.cursor, "b:*", 100)
      expect(second).toEqual({ cursor: "0", keys: ["b:1"] })
    })

    it("walks the keys that existed when the scan started", async () => {
      await source.setString("k1", "x")
      await source.setString("k2", "x")
      await source.setString("k3", "x")

      const first = await source.scan("0", "*", 10)
      await source.setString("k4", "x")
      await source.deleteKey("k3")
      const second = await source.scan(first.cursor, "*", 10)

      expect(first.keys).toEqual(["k1", "k2"])
      expect(second).toEqual({ cursor: "0", keys: [] })
    })

    it("can resume from the same cursor twice", async () => {
      for (const key of ["a", "b", "c", "d"]) await source.setString(key, "x")

      const first = await source.scan("0", "*", 10)
      const again = await source.scan(first.cursor, "*", 10)
      const retry = await source.scan(first.cursor, "*", 10)

      expect(retry.keys).toEqual(again.keys)
    })

    it("forgets a scan once it completes", async () => {
      for (const key of ["a", "b", "c"]) await source.setString(key, "x")

      const first = await source.scan("0", "*", 10)
      const last = await source.scan(first.cursor, "*", 10)
      expect(last.cursor).toBe("0")

      await expect(source.scan(first.cursor, "*", 10)).rejects.toThrow("SCAN failed: ERR invalid cursor")
    })

    it("keeps a bounded number of abandoned scans", async () => {
      for (const key of ["a", "b", "c"]) await source.setString(key, "x")

      const abandoned = await source.scan("0", "*", 10)
      for (let i = 0; i < 32; i++) await source.scan("0", "*", 10)
      const recent = await source.scan("0", "*", 10)

      await expect(source.scan(abandoned.cursor, "*", 10)).rejects.toThrow("SCAN failed: ERR invalid cursor")
      expect(await source.scan(recent.cursor, "*", 10)).toEqual({ cursor: "0", keys: ["c"] })
    })

    it("rejects an unknown cursor", async () => {
      await expect(source.scan("12345", "*", 10)).rejects.toThrow("SCAN failed: ERR invalid cursor")
    })

    it("completes in one call without a work limit", async () => {
      const unbounded = new MemoryKeyspaceDataSource()
      await unbounded.connect()
      await unbounded.setString("a", "1")
      await unbounded.setString("b", "2")

      expect(await unbounded.scan("0", "*", 10)).toEqual({ cursor: "0", keys: ["a", "b"] })
    })
  })

  describe("values", () => {
    it("rejects reads of the wrong type", async () => {
      await source.setString("s", "x")

      await expect(source.getHash("s")).rejects.toThrow(
        "HGETALL failed: WRONGTYPE Operation against a key holding the wrong kind of value",
      )
    })

    it("fails every call once disconnected", async () => {
      await source.disconnect()

      const err = await source.getString("s").catch((e: unknown) => e)

      expect(err).toBeInstanceOf(TransportError)
      expect(err).toMatchObject({ message: "GET failed: The client is closed", isRetryable: true })
    })

    it("orders sorted set members by score then member", async () => {
      await source.zsetAdd("z", "b", 2)
      await source.zsetAdd("z", "a", 2)
      await source.zsetAdd("z", "c", 1)

      expect((await source.getZset("z")).map((e) => e.member)).toEqual(["c", "a", "b"])
      expect(await source.getZset("z", -1, -1)).toEqual([{ member: "b", score: 2 }])
    })

    it("counts only new members", async () => {
      expect(await source.setAdd("s", ["a", "b"])).toBe(2)
      expect(await source.setAdd("s", ["b", "c"])).toBe(1)
      expect(await source.hashSet("h", "f", "1")).toBe(1)
      expect(await source.hashSet("h", "f", "2")).toBe(0)
    })

    it("removes list items from the tail with a negative count", async () => {
      await source.listPush("l", ["a", "x", "a", "x", "a"])

      expect(await source.listRemove("l", "a", -2)).toBe(2)
      expect(await source.getList("l")).toEqual(["a", "x", "x"])
    })

    it("rejects an out of range list index", async () => {
      await source.listPush("l", ["a"])

      await expect(source.listSet("l", 5, "b")).rejects.toThrow("LSET failed: ERR index out of range")
    })
  })

  describe("expiry", () => {
    it("clears a TTL when a string is set again", async () => {
      await source.setString("s", "1", 60)
      expect(await source.ttl("s")).toBe(60)

      await source.setString("s", "2")
      expect(await source.ttl("s")).toBe(-1)
    })

    it("deletes the key for a zero TTL", async () => {
      await source.setString("s", "1")

      expect(await source.setTtl("s", 0)).toBe(true)
      expect(await source.typeOf("s")).toBe("none")
    })

    it("carries the TTL over a rename", async () => {
      await source.setString("a", "1", 90)
      await source.renameKey("a", "b")

      expect(await source.ttl("b")).toBe(90)
    })
  })

  describe("metadata", () => {
    it.each([
      ["12345", "int"],
      ["short text", "embstr"],
      ["x".repeat(45), "raw"],
    ])("encodes %j as %s", async (value, expected) => {
      await source.setString("s", value)

      expect(await source.encoding("s")).toBe(expected)
    })

    it("reports intset for integer sets and listpack otherwise", async () => {
      await source.setAdd("ints", ["1", "2"])
      await source.setAdd("words", ["a"])

      expect(await source.encoding("ints")).toBe("intset")
      expect(await source.encoding("words")).toBe("listpack")
      expect(await source.encoding("missing")).toBe("unknown")
    })

    it("estimates memory usage", async () => {
      await source.hashSet("h", "name", "Ada")

      expect(await source.memoryUsage("h")).toBe(48 + 1 + 4 + 3)
      expect(await source.memoryUsage("missing")).toBeUndefined()
    })
  })

  describe("databases", () => {
    it("keeps databases apart and labels the selected one", async () => {
      const named = new MemoryKeyspaceDataSource({ name: "fixture" })
      await named.connect()
      await named.setString("zero", "0")

      expect(await named.switchDb(3)).toBe(true)
      expect(named.label).toBe("fixture/db3")
      expect(await named.typeOf("zero")).toBe("none")

      await named.setString("three", "3")
      expect([...(await named.keyspaceInfo())]).toEqual([
        [0, 1],
        [3, 1],
      ])
    })

    it("refuses out of range indexes and closed connections", async () => {
      expect(await source.switchDb(16)).toBe(false)

      await source.disconnect()
      expect(await source.switchDb(1)).toBe(false)
      expect(source.db).toBe(0)
    })
  })

  describe("executeCommand", () => {
    it.each([
      ["PING", "PONG"],
      ["ECHO hi", "hi"],
      ["RPUSH l a b", "2"],
      ["LPUSH l2 a b", "2"],
      ["HSET h f1 v1 f2 v2", "2"],
      ["ZADD z 1 one 2 two", "2"],
      ["SADD s m", "1"],
      ["DBSIZE", "0"],
      ["EXISTS nope", "0"],
      ["HSET h f1", "(error) ERR wrong number of arguments for 'hset' command"],
      ["GET", "(error) ERR wrong number of arguments for 'get' command"],
      ["EXPIRE k soon", "(error) ERR value is not an integer or out of range"],
      ["RENAME nope other", "(error) ERR no such key"],
    ])("%s prints %j", async (line, expected) => {
      expect(await source.executeCommand(line)).toBe(expected)
    })

    it("prints collections as numbered lines", async () => {
      await source.executeCommand("LPUSH l a b c")
      await source.executeCommand("HSET h f v")

      expect(await source.executeCommand("LRANGE l 0 -1")).toBe("1) c\n2) b\n3) a")
      expect(await source.executeCommand("HGETALL h")).toBe("1) f\n2) v")
      expect(await source.executeCommand("SMEMBERS none")).toBe("(empty list)")
    })

    it("prints type errors without the transport prefix", async () => {
      await source.setString("s", "x")

      expect(await source.executeCommand("HGET s f")).toBe(
        "(error) WRONGTYPE Operation against a key holding the wrong kind of value",
      )
    })

    it("clears the selected database with FLUSHDB", async () => {
      await source.setString("a", "1")

      expect(await source.executeCommand("flushdb")).toBe("OK")
      expect(await source.dbSize()).toBe(0)
    })

    it("reports server info with a keyspace section", async () => {
      await source.setString("a", "1", 10)

      expect(await source.serverInfo()).toEqual({
        server: { redis_version: "7.2.0", redis_mode: "standalone" },
        keyspace: { db0: "keys=1,expires=1,avg_ttl=0" },
      })
    })
  })
})
