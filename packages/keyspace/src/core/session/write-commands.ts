const writeCommands: ReadonlySet<string> = new Set([
  "SET",
  "DEL",
  "HSET",
  "HDEL",
  "LPUSH",
  "RPUSH",
  "SADD",
  "ZADD",
  "SREM",
  "ZREM",
  "RENAME",
  "EXPIRE",
  "PERSIST",
  "FLUSHDB",
])

/** `true` when running `line` can add, remove or retype keys. */
export function isWriteCommand(line: string): boolean {
  const name = line.trim().split(/\s+/)[0]
  return name !== undefined && writeCommands.has(name.toUpperCase())
}
