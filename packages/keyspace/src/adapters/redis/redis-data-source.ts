import { BaseError } from "@keyscope/errors"
import { type Logger, NullLogger } from "@keyscope/logger"
import { ErrorReply } from "redis"
import { formatErrorReply, formatReply, tokenizeCommand } from "../../core/commands/format-reply"
import { ResolutionError, TransportError } from "../../core/errors/keyspace-errors"
import type { KeyspaceDataSource, ServerInfo, ZsetEntry } from "../../ports/data-source"
import { type KeyType, toKeyType } from "../../ports/key-type"
import type { ScanPage } from "../../ports/scan-page"
import { parseInfo, parseKeyspaceCounts } from "./parse-info"
import type { RedisKeyspaceClient } from "./redis-client"

export type RedisDataSourceDeps = {
  client: RedisKeyspaceClient
  logger?: Logger
}

export type RedisDataSourceOptions = {
  /** Connection URL the client was created with; only used for the label. */
  url: string
  /** Database the client selects on connect. */
  database: number
}

/** Pipeline failures where individual replies were errors. */
function hasReplyErrors(err: unknown): boolean {
  return err instanceof Error && "errorIndexes" in err && Array.isArray(err.errorIndexes)
}

export class RedisKeyspaceDataSource implements KeyspaceDataSource {
  private readonly client: RedisKeyspaceClient
  private readonly logger: Logger
  private readonly endpoint: string
  private readonly secured: boolean
  private dbIndex: number

  constructor(deps: RedisDataSourceDeps, opts: RedisDataSourceOptions) {
    this.client = deps.client
    this.dbIndex = opts.database

    const url = new URL(opts.url)
    this.endpoint = `${url.hostname}:${url.port || "6379"}`
    this.secured = url.password !== ""

    this.logger = (deps.logger ?? new NullLogger()).child({ module: "redis-data-source", session: this.endpoint })

    this.client.on("error", (err) => {
      this.logger.warn("Redis client error", { err })
    })
  }

  get label(): string {
    return `${this.secured ? "🔒" : ""}${this.endpoint}/db${this.dbIndex}`
  }

  get db(): number {
    return this.dbIndex
  }

  async connect(): Promise<void> {
    if (this.client.isOpen) return
    await this.call("CONNECT", () => this.client.connect())
    this.logger.info("Connected", { db: this.dbIndex })
  }

  async disconnect(): Promise<void> {
    if (!this.client.isOpen) return
    await this.call("CLOSE", () => this.client.close())
  }

  isConnected(): boolean {
    return this.client.isReady
  }

  async scan(cursor: string, pattern: string, count: number): Promise<ScanPage> {
    const reply = await this.call("SCAN", () => this.client.scan(cursor, { MATCH: pattern, COUNT: count }), {
      cursor,
      pattern,
    })

    return { cursor: String(reply.cursor), keys: reply.keys }
  }

  async typeOf(key: string): Promise<KeyType> {
    return toKeyType(await this.call("TYPE", () => this.client.type(key), { key }))
  }

  async typeOfMany(keys: readonly string[]): Promise<KeyType[]> {
    if (keys.length === 0) return []

    const pipeline = this.client.multi()
    for (const key of keys) pipeline.type(key)

    let replies: unknown[]
    try {
      replies = await pipeline.execAsPipeline()
    } catch (err) {
      if (hasReplyErrors(err)) throw ResolutionError.forKeys(keys, err)
      throw TransportError.fromCause("TYPE pipeline", err, { count: keys.length })
    }

    if (replies.length !== keys.length) throw ResolutionError.forKeys(keys)

    return replies.map((reply) => {
      if (typeof reply !== "string") throw ResolutionError.forKeys(keys, reply)
      return toKeyType(reply)
    })
  }

  ttl(key: string): Promise<number> {
    return this.call("TTL", () => this.client.ttl(key), { key })
  }

  async encoding(key: string): Promise<string> {
    const encoding = await this.call("OBJECT ENCODING", () => this.client.objectEncoding(key), { key })
    return encoding ?? "unknown"
  }

  async memoryUsage(key: string): Promise<number | undefined> {
    try {
      return (await this.client.memoryUsage(key)) ?? undefined
    } catch (err) {
      this.logger.warn("Memory usage unavailable", { key, err })
      return undefined
    }
  }

  getString(key: string): Promise<string | null> {
    return this.call("GET", () => this.client.get(key), { key })
  }

  getList(key: string, start: number = 0, end: number = -1): Promise<string[]> {
    return this.call("LRANGE", () => this.client.lRange(key, start, end), { key })
  }

  getHash(key: string): Promise<Record<string, string>> {
    return this.call("HGETALL", () => this.client.hGetAll(key), { key })
  }

  getSet(key: string): Promise<string[]> {
    return this.call("SMEMBERS", () => this.client.sMembers(key), { key })
  }

  async getZset(key: string, start: number = 0, end: number = -1): Promise<ZsetEntry[]> {
    const entries = await this.call("ZRANGE", () => this.client.zRangeWithScores(key, start, end), { key })
    return entries.map(({ value, score }) => ({ member: value, score }))
  }

  async setString(key: string, value: string, ttlSeconds?: number): Promise<void> {
    const opts = ttlSeconds !== undefined && ttlSeconds > 0 ? { expiration: { type: "EX" as const, value: ttlSeconds } } : {}
    await this.call("SET", () => this.client.set(key, value, opts), { key })
  }

  listPush(key: string, values: readonly string[]): Promise<number> {
    return this.call("RPUSH", () => this.client.rPush(key, [...values]), { key })
  }

  async listSet(key: string, index: number, value: string): Promise<void> {
    await this.call("LSET", () => this.client.lSet(key, index, value), { key })
  }

  listRemove(key: string, value: string, count: number = 1): Promise<number> {
    return this.call("LREM", () => this.client.lRem(key, count, value), { key })
  }

  hashSet(key: string, field: string, value: string): Promise<number> {
    return this.call("HSET", () => this.client.hSet(key, field, value), { key })
  }

  hashDelete(key: string, fields: readonly string[]): Promise<number> {
    return this.call("HDEL", () => this.client.hDel(key, [...fields]), { key })
  }

  setAdd(key: string, members: readonly string[]): Promise<number> {
    return this.call("SADD", () => this.client.sAdd(key, [...members]), { key })
  }

  setRemove(key: string, members: readonly string[]): Promise<number> {
    return this.call("SREM", () => this.client.sRem(key, [...members]), { key })
  }

  zsetAdd(key: string, member: string, score: number): Promise<number> {
    return this.call("ZADD", () => this.client.zAdd(key, { score, value: member }), { key })
  }

  zsetRemove(key: string, members: readonly string[]): Promise<number> {
    return this.call("ZREM", () => this.client.zRem(key, [...members]), { key })
  }

  async deleteKey(key: string): Promise<boolean> {
    return (await this.call("DEL", () => this.client.del(key), { key })) > 0
  }

  async renameKey(key: string, newKey: string): Promise<boolean> {
    try {
      await this.client.rename(key, newKey)
      return true
    } catch (err) {
      if (err instanceof ErrorReply) return false
      throw TransportError.fromCause("RENAME", err, { key })
    }
  }

  async setTtl(key: string, ttlSeconds: number): Promise<boolean> {
    const reply =
      ttlSeconds < 0
        ? await this.call("PERSIST", () => this.client.persist(key), { key })
        : await this.call("EXPIRE", () => this.client.expire(key, ttlSeconds), { key })

    return reply === 1
  }

  async switchDb(index: number): Promise<boolean> {
    try {
      await this.client.select(index)
      this.dbIndex = index
      return true
    } catch (err) {
      this.logger.warn("SELECT failed", { db: index, err })
      return false
    }
  }

  async keyspaceInfo(): Promise<Map<number, number>> {
    try {
      const info = parseInfo(await this.client.info("keyspace"))
      return parseKeyspaceCounts(info["keyspace"])
    } catch (err) {
      this.logger.warn("Keyspace info unavailable", { err })
      return new Map()
    }
  }

  dbSize(): Promise<number> {
    return this.call("DBSIZE", () => this.client.dbSize())
  }

  async serverInfo(): Promise<ServerInfo> {
    return parseInfo(await this.call("INFO", () => this.client.info()))
  }

  async executeCommand(line: string): Promise<string> {
    const [name, ...args] = tokenizeCommand(line)
    if (name === undefined) return ""

    try {
      return formatReply(await this.client.sendCommand([name.toUpperCase(), ...args]))
    } catch (err) {
      return formatErrorReply(err)
    }
  }

  private async call<T>(operation: string, fn: () => Promise<T>, context: Record<string, unknown> = {}): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      if (err instanceof BaseError) throw err
      throw TransportError.fromCause(operation, err, context)
    }
  }
}
