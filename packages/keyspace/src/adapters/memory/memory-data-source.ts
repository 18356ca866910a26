import { BaseError } from "@keyscope/errors"
import { formatErrorReply, formatReply, tokenizeCommand } from "../../core/commands/format-reply"
import { TransportError } from "../../core/errors/keyspace-errors"
import { globMatch } from "../../core/glob/glob-match"
import type { KeyspaceDataSource, ServerInfo, ZsetEntry } from "../../ports/data-source"
import type { KeyType, ValueKeyType } from "../../ports/key-type"
import { isTerminalCursor, TERMINAL_CURSOR } from "../../ports/scan-cursor"
import type { ScanPage } from "../../ports/scan-page"
import {
  approximateSize,
  encodingOf,
  isEmptyValue,
  type MemoryValue,
  type MemoryValueOf,
  sliceRange,
  sortedZset,
} from "./memory-values"

export type MemoryDataSourceOptions = {
  /** Shown in the connection label. @default "memory" */
  name: string
  /** Number of logical databases. @default 16 */
  databases: number
  /** Database selected initially. @default 0 */
  db: number
  /**
   * Upper bound on keys examined per SCAN call whatever COUNT asks for.
   * Small values produce short and empty pages.
   */
  scanWorkLimit?: number
}

type ScanState = {
  db: number
  keys: readonly string[]
}

/** Snapshots kept for scans still in progress; the oldest is dropped past this. */
const MAX_OPEN_SCANS = 32

const WRONGTYPE = "WRONGTYPE Operation against a key holding the wrong kind of value"

function isOfType<T extends ValueKeyType>(entry: MemoryValue, type: T): entry is MemoryValueOf<T> {
  return entry.type === type
}

function arityError(command: string): Error {
  return new Error(`ERR wrong number of arguments for '${command.toLowerCase()}' command`)
}

function parseInteger(raw: string | undefined): number {
  if (raw === undefined || !/^-?\d+$/.test(raw)) throw new Error("ERR value is not an integer or out of range")
  return Number.parseInt(raw, 10)
}

function parseScore(raw: string | undefined): number {
  const score = Number(raw)
  if (raw === undefined || raw.trim() === "" || Number.isNaN(score)) throw new Error("ERR value is not a valid float")
  return score
}

/**
 * In-process store with the semantics the keyspace session relies on:
 * typed values, empty collections removed, `none` for missing keys, a
 * snapshot-based SCAN that may return short or empty pages, and glob MATCH.
 *
 * TTLs are recorded but never count down.
 */
export class MemoryKeyspaceDataSource implements KeyspaceDataSource {
  private readonly dbs: Map<string, MemoryValue>[]
  private readonly ttls: Map<string, number>[]
  private readonly scans = new Map<number, ScanState>()
  private readonly opts: MemoryDataSourceOptions
  private scanSeq = 0
  private connected = false
  private dbIndex: number

  constructor(opts: Partial<MemoryDataSourceOptions> = {}) {
    this.opts = { name: "memory", databases: 16, db: 0, ...opts }
    this.dbs = Array.from({ length: this.opts.databases }, () => new Map())
    this.ttls = Array.from({ length: this.opts.databases }, () => new Map())
    this.dbIndex = this.opts.db
  }

  get label(): string {
    return `${this.opts.name}/db${this.dbIndex}`
  }

  get db(): number {
    return this.dbIndex
  }

  async connect(): Promise<void> {
    this.connected = true
  }

  async disconnect(): Promise<void> {
    this.connected = false
  }

  isConnected(): boolean {
    return this.connected
  }

  scan(cursor: string, pattern: string, count: number): Promise<ScanPage> {
    return this.run("SCAN", () => {
      let id: number
      let offset = 0

      if (isTerminalCursor(cursor)) {
        id = ++this.scanSeq
        this.openScan(id, { db: this.dbIndex, keys: [...this.current().keys()] })
      } else {
        const match = /^(\d+)\.(\d+)$/.exec(cursor)
        id = Number(match?.[1])
        offset = Number(match?.[2])
      }

      const state = this.scans.get(id)
      if (!state || offset > state.keys.length) throw new Error("ERR invalid cursor")

      const examine = Math.max(1, Math.min(count, this.opts.scanWorkLimit ?? count))
      const examined = state.keys.slice(offset, offset + examine)
      const next = offset + examined.length
      const live = this.database(state.db, this.dbs)
      const keys = examined.filter((key) => live.has(key) && globMatch(pattern, key))

      if (next >= state.keys.length) {
        this.scans.delete(id)
        return { cursor: TERMINAL_CURSOR, keys }
      }

      return { cursor: `${id}.${next}`, keys }
    })
  }

  typeOf(key: string): Promise<KeyType> {
    return this.run("TYPE", () => this.current().get(key)?.type ?? "none")
  }

  typeOfMany(keys: readonly string[]): Promise<KeyType[]> {
    return this.run("TYPE", () => keys.map((key) => this.current().get(key)?.type ?? "none"))
  }

  ttl(key: string): Promise<number> {
    return this.run("TTL", () => {
      if (!this.current().has(key)) return -2
      return this.currentTtls().get(key) ?? -1
    })
  }

  encoding(key: string): Promise<string> {
    return this.run("OBJECT ENCODING", () => {
      const entry = this.current().get(key)
      return entry ? encodingOf(entry) : "unknown"
    })
  }

  memoryUsage(key: string): Promise<number | undefined> {
    return this.run("MEMORY USAGE", () => {
      const entry = this.current().get(key)
      return entry ? approximateSize(key, entry) : undefined
    })
  }

  getString(key: string): Promise<string | null> {
    return this.run("GET", () => this.read(key, "string")?.value ?? null)
  }

  getList(key: string, start: number = 0, end: number = -1): Promise<string[]> {
    return this.run("LRANGE", () => sliceRange(this.read(key, "list")?.value ?? [], start, end))
  }

  getHash(key: string): Promise<Record<string, string>> {
    return this.run("HGETALL", () => Object.fromEntries(this.read(key, "hash")?.value ?? []))
  }

  getSet(key: string): Promise<string[]> {
    return this.run("SMEMBERS", () => [...(this.read(key, "set")?.value ?? [])])
  }

  getZset(key: string, start: number = 0, end: number = -1): Promise<ZsetEntry[]> {
    return this.run("ZRANGE", () => {
      const entry = this.read(key, "zset")
      return entry ? sliceRange(sortedZset(entry.value), start, end) : []
    })
  }

  setString(key: string, value: string, ttlSeconds?: number): Promise<void> {
    return this.run("SET", () => {
      this.current().set(key, { type: "string", value })
      if (ttlSeconds !== undefined && ttlSeconds > 0) this.currentTtls().set(key, ttlSeconds)
      else this.currentTtls().delete(key)
    })
  }

  listPush(key: string, values: readonly string[]): Promise<number> {
    return this.run("RPUSH", () => {
      const list = this.readOrCreate(key, "list", () => ({ type: "list", value: [] }))
      list.value.push(...values)
      return list.value.length
    })
  }

  listSet(key: string, index: number, value: string): Promise<void> {
    return this.run("LSET", () => {
      const list = this.read(key, "list")
      if (!list) throw new Error("ERR no such key")

      const at = index < 0 ? list.value.length + index : index
      if (at < 0 || at >= list.value.length) throw new Error("ERR index out of range")
      list.value[at] = value
    })
  }

  listRemove(key: string, value: string, count: number = 1): Promise<number> {
    return this.run("LREM", () => {
      const list = this.read(key, "list")
      if (!list) return 0

      const limit = count === 0 ? Number.POSITIVE_INFINITY : Math.abs(count)
      const ordered = count < 0 ? [...list.value].reverse() : list.value
      const kept: string[] = []
      let removed = 0

      for (const item of ordered) {
        if (item === value && removed < limit) removed++
        else kept.push(item)
      }

      list.value = count < 0 ? kept.reverse() : kept
      this.dropIfEmpty(key)
      return removed
    })
  }

  hashSet(key: string, field: string, value: string): Promise<number> {
    return this.run("HSET", () => {
      const hash = this.readOrCreate(key, "hash", () => ({ type: "hash", value: new Map() }))
      const added = hash.value.has(field) ? 0 : 1
      hash.value.set(field, value)
      return added
    })
  }

  hashDelete(key: string, fields: readonly string[]): Promise<number> {
    return this.run("HDEL", () => {
      const hash = this.read(key, "hash")
      if (!hash) return 0

      const removed = fields.filter((field) => hash.value.delete(field)).length
      this.dropIfEmpty(key)
      return removed
    })
  }

  setAdd(key: string, members: readonly string[]): Promise<number> {
    return this.run("SADD", () => {
      const set = this.readOrCreate(key, "set", () => ({ type: "set", value: new Set() }))
      const before = set.value.size
      for (const member of members) set.value.add(member)
      return set.value.size - before
    })
  }

  setRemove(key: string, members: readonly string[]): Promise<number> {
    return this.run("SREM", () => {
      const set = this.read(key, "set")
      if (!set) return 0

      const removed = members.filter((member) => set.value.delete(member)).length
      this.dropIfEmpty(key)
      return removed
    })
  }

  zsetAdd(key: string, member: string, score: number): Promise<number> {
    return this.run("ZADD", () => {
      const zset = this.readOrCreate(key, "zset", () => ({ type: "zset", value: new Map() }))
      const added = zset.value.has(member) ? 0 : 1
      zset.value.set(member, score)
      return added
    })
  }

  zsetRemove(key: string, members: readonly string[]): Promise<number> {
    return this.run("ZREM", () => {
      const zset = this.read(key, "zset")
      if (!zset) return 0

      const removed = members.filter((member) => zset.value.delete(member)).length
      this.dropIfEmpty(key)
      return removed
    })
  }

  deleteKey(key: string): Promise<boolean> {
    return this.run("DEL", () => this.remove(key))
  }

  renameKey(key: string, newKey: string): Promise<boolean> {
    return this.run("RENAME", () => {
      const entry = this.current().get(key)
      if (!entry) return false

      const ttl = this.currentTtls().get(key)
      this.remove(key)
      this.remove(newKey)
      this.current().set(newKey, entry)
      if (ttl !== undefined) this.currentTtls().set(newKey, ttl)
      return true
    })
  }

  setTtl(key: string, ttlSeconds: number): Promise<boolean> {
    return this.run(ttlSeconds < 0 ? "PERSIST" : "EXPIRE", () => {
      if (!this.current().has(key)) return false
      if (ttlSeconds < 0) return this.currentTtls().delete(key)

      if (ttlSeconds === 0) return this.remove(key)
      this.currentTtls().set(key, ttlSeconds)
      return true
    })
  }

  async switchDb(index: number): Promise<boolean> {
    if (!this.connected || !Number.isInteger(index) || index < 0 || index >= this.dbs.length) return false

    this.dbIndex = index
    return true
  }

  keyspaceInfo(): Promise<Map<number, number>> {
    return this.run("INFO keyspace", () => {
      const info = new Map<number, number>()
      for (const [index, db] of this.dbs.entries()) {
        if (db.size > 0) info.set(index, db.size)
      }
      return info
    })
  }

  dbSize(): Promise<number> {
    return this.run("DBSIZE", () => this.current().size)
  }

  serverInfo(): Promise<ServerInfo> {
    return this.run("INFO", () => {
      const keyspace: Record<string, string> = {}
      for (const [index, db] of this.dbs.entries()) {
        if (db.size === 0) continue
        keyspace[`db${index}`] = `keys=${db.size},expires=${this.database(index, this.ttls).size},avg_ttl=0`
      }

      return {
        server: { redis_version: "7.2.0", redis_mode: "standalone" },
        keyspace,
      }
    })
  }

  async executeCommand(line: string): Promise<string> {
    const [name, ...args] = tokenizeCommand(line)
    if (name === undefined) return ""

    try {
      return formatReply(await this.dispatch(name.toUpperCase(), args))
    } catch (err) {
      return formatErrorReply(err instanceof TransportError && err.cause instanceof Error ? err.cause : err)
    }
  }

  private async dispatch(command: string, args: string[]): Promise<unknown> {
    const need = (min: number): void => {
      if (args.length < min) throw arityError(command)
    }
    const at = (i: number): string => args[i] ?? ""

    switch (command) {
      case "PING":
        return args.length > 0 ? at(0) : "PONG"
      case "ECHO":
        need(1)
        return at(0)
      case "GET":
        need(1)
        return this.getString(at(0))
      case "SET":
        need(2)
        await this.setString(at(0), at(1))
        return "OK"
      case "DEL": {
        need(1)
        let removed = 0
        for (const key of args) if (await this.deleteKey(key)) removed++
        return removed
      }
      case "EXISTS":
        need(1)
        return this.run("EXISTS", () => args.filter((key) => this.current().has(key)).length)
      case "TYPE":
        need(1)
        return this.typeOf(at(0))
      case "KEYS":
        need(1)
        return this.run("KEYS", () => [...this.current().keys()].filter((key) => globMatch(at(0), key)))
      case "DBSIZE":
        return this.dbSize()
      case "TTL":
        need(1)
        return this.ttl(at(0))
      case "EXPIRE":
        need(2)
        return (await this.setTtl(at(0), parseInteger(at(1)))) ? 1 : 0
      case "PERSIST":
        need(1)
        return (await this.setTtl(at(0), -1)) ? 1 : 0
      case "RENAME":
        need(2)
        if (!(await this.renameKey(at(0), at(1)))) throw new Error("ERR no such key")
        return "OK"
      case "HSET": {
        if (args.length < 3 || args.length % 2 === 0) throw arityError(command)
        let added = 0
        for (let i = 1; i < args.length; i += 2) added += await this.hashSet(at(0), at(i), at(i + 1))
        return added
      }
      case "HGET":
        need(2)
        return this.run("HGET", () => this.read(at(0), "hash")?.value.get(at(1)) ?? null)
      case "HGETALL":
        need(1)
        return Object.entries(await this.getHash(at(0))).flat()
      case "HDEL":
        need(2)
        return this.hashDelete(at(0), args.slice(1))
      case "LPUSH":
        need(2)
        return this.run("LPUSH", () => {
          const list = this.readOrCreate(at(0), "list", () => ({ type: "list", value: [] }))
          for (const value of args.slice(1)) list.value.unshift(value)
          return list.value.length
        })
      case "RPUSH":
        need(2)
        return this.listPush(at(0), args.slice(1))
      case "LRANGE":
        need(3)
        return this.getList(at(0), parseInteger(at(1)), parseInteger(at(2)))
      case "SADD":
        need(2)
        return this.setAdd(at(0), args.slice(1))
      case "SREM":
        need(2)
        return this.setRemove(at(0), args.slice(1))
      case "SMEMBERS":
        need(1)
        return this.getSet(at(0))
      case "ZADD": {
        if (args.length < 3 || args.length % 2 === 0) throw arityError(command)
        let added = 0
        for (let i = 1; i < args.length; i += 2) added += await this.zsetAdd(at(0), at(i + 1), parseScore(at(i)))
        return added
      }
      case "ZREM":
        need(2)
        return this.zsetRemove(at(0), args.slice(1))
      case "ZRANGE": {
        need(3)
        const entries = await this.getZset(at(0), parseInteger(at(1)), parseInteger(at(2)))
        return entries.map((entry) => entry.member)
      }
      case "FLUSHDB":
        return this.run("FLUSHDB", () => {
          this.current().clear()
          this.currentTtls().clear()
          return "OK"
        })
      default:
        throw new Error(`ERR unknown command '${command.toLowerCase()}'`)
    }
  }

  private async run<T>(operation: string, fn: () => T): Promise<T> {
    if (!this.connected) throw TransportError.fromCause(operation, new Error("The client is closed"))

    try {
      return fn()
    } catch (err) {
      if (err instanceof BaseError) throw err
      throw TransportError.fromCause(operation, err)
    }
  }

  private openScan(id: number, state: ScanState): void {
    this.scans.set(id, state)

    for (const oldest of this.scans.keys()) {
      if (this.scans.size <= MAX_OPEN_SCANS) break
      this.scans.delete(oldest)
    }
  }

  private database<T>(index: number, from: readonly Map<string, T>[]): Map<string, T> {
    const db = from[index]
    if (!db) throw new Error("ERR DB index is out of range")
    return db
  }

  private current(): Map<string, MemoryValue> {
    return this.database(this.dbIndex, this.dbs)
  }

  private currentTtls(): Map<string, number> {
    return this.database(this.dbIndex, this.ttls)
  }

  private read<T extends ValueKeyType>(key: string, type: T): MemoryValueOf<T> | undefined {
    const entry = this.current().get(key)
    if (entry === undefined) return undefined
    if (!isOfType(entry, type)) throw new Error(WRONGTYPE)
    return entry
  }

  private readOrCreate<T extends ValueKeyType>(key: string, type: T, create: () => MemoryValueOf<T>): MemoryValueOf<T> {
    const existing = this.read(key, type)
    if (existing) return existing

    const created = create()
    this.current().set(key, created)
    return created
  }

  private remove(key: string): boolean {
    this.currentTtls().delete(key)
    return this.current().delete(key)
  }

  private dropIfEmpty(key: string): void {
    const entry = this.current().get(key)
    if (entry && isEmptyValue(entry)) this.remove(key)
  }
}
