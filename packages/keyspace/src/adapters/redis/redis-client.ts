import { createClient } from "redis"

export type RedisSetOptions = {
  expiration?: { type: "EX"; value: number }
}

/**
 * The slice of the node-redis client the data source uses, with string
 * replies.
 */
export type RedisKeyspaceClient = {
  connect(): Promise<unknown>
  close(): Promise<void>
  readonly isOpen: boolean
  readonly isReady: boolean
  on(event: "error", listener: (err: Error) => void): unknown

  select(db: number): Promise<unknown>
  scan(cursor: string, opts?: { MATCH?: string; COUNT?: number }): Promise<{ cursor: string; keys: string[] }>
  type(key: string): Promise<string>
  ttl(key: string): Promise<number>
  objectEncoding(key: string): Promise<string | null>
  memoryUsage(key: string): Promise<number | null>

  get(key: string): Promise<string | null>
  set(key: string, value: string, opts?: RedisSetOptions): Promise<string | null>
  lRange(key: string, start: number, stop: number): Promise<string[]>
  rPush(key: string, elements: string[]): Promise<number>
  lSet(key: string, index: number, element: string): Promise<string>
  lRem(key: string, count: number, element: string): Promise<number>
  hGetAll(key: string): Promise<Record<string, string>>
  hSet(key: string, field: string, value: string): Promise<number>
  hDel(key: string, fields: string[]): Promise<number>
  sMembers(key: string): Promise<string[]>
  sAdd(key: string, members: string[]): Promise<number>
  sRem(key: string, members: string[]): Promise<number>
  zRangeWithScores(key: string, start: number, stop: number): Promise<{ value: string; score: number }[]>
  zAdd(key: string, member: { score: number; value: string }): Promise<number>
  zRem(key: string, members: string[]): Promise<number>

  del(keys: string | string[]): Promise<number>
  rename(key: string, newKey: string): Promise<string>
  expire(key: string, seconds: number): Promise<number>
  persist(key: string): Promise<number>

  info(section?: string): Promise<string>
  dbSize(): Promise<number>
  sendCommand(args: string[]): Promise<unknown>

  multi(): {
    type(key: string): unknown
    execAsPipeline(): Promise<unknown[]>
  }
}

export type RedisClientConfig = {
  url: string
  database: number
  connectTimeoutMs: number
}

export function createRedisClient(config: RedisClientConfig): RedisKeyspaceClient {
  return createClient({
    url: config.url,
    database: config.database,
    socket: { connectTimeout: config.connectTimeoutMs },
  }) as unknown as RedisKeyspaceClient
}
