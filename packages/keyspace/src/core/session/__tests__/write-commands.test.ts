import { isWriteCommand } from "../write-commands"

describe("isWriteCommand", () => {
  it.each(["SET a 1", "del a", "  hset h f v", "FLUSHDB", "rename a b", "persist a", "zrem z m"])(
    "treats %j as a write",
    (line) => {
      expect(isWriteCommand(line)).toBe(true)
    },
  )

  it.each(["GET a", "HGETALL h", "TTL a", "", "   ", "SETNX a 1", "INCR counter"])("treats %j as a read", (line) => {
    expect(isWriteCommand(line)).toBe(false)
  })
})
