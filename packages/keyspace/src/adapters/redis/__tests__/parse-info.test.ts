import { parseInfo, parseKeyspaceCounts } from "../parse-info"

describe("parseInfo", () => {
  it("groups fields under lower-cased section names", () => {
    const raw = ["# Server", "redis_version:7.2.4", "redis_mode:standalone", "", "# Keyspace", "db0:keys=3,expires=1,avg_ttl=0", ""].join(
      "\r\n",
    )

    expect(parseInfo(raw)).toEqual({
      server: { redis_version: "7.2.4", redis_mode: "standalone" },
      keyspace: { db0: "keys=3,expires=1,avg_ttl=0" },
    })
  })

  it("puts fields before the first header in default and keeps colons in values", () => {
    expect(parseInfo("executable:/usr/bin/redis-server\nconfig_file:C:\\redis.conf")).toEqual({
      default: { executable: "/usr/bin/redis-server", config_file: "C:\\redis.conf" },
    })
  })

  it("keeps empty sections and skips malformed lines", () => {
    expect(parseInfo("# Keyspace\n:nothing\njunk")).toEqual({ keyspace: {} })
  })
})

describe("parseKeyspaceCounts", () => {
  it("maps database indexes to key counts", () => {
    const counts = parseKeyspaceCounts({
      db0: "keys=12,expires=0,avg_ttl=0",
      db7: "keys=1,expires=1,avg_ttl=500",
      aof_enabled: "0",
    })

    expect([...counts]).toEqual([
      [0, 12],
      [7, 1],
    ])
  })

  it("is empty without a keyspace section", () => {
    expect(parseKeyspaceCounts().size).toBe(0)
  })
})
