import type { KeyType } from "./key-type"
import type { ScanPage } from "./scan-page"

export type ZsetEntry = {
  member: string
  score: number
}

/** `INFO` output grouped by section, e.g. `info["server"]["redis_version"]`. */
export type ServerInfo = Record<string, Record<string, string>>

/**
 * Everything the keyspace session needs from a store connection.
 *
 * Implementations wrap client failures in `TransportError`. Calls marked
 * soft never reject.
 */
export interface KeyspaceDataSource {
  /** Human-readable connection string, e.g. `🔒localhost:6379/db0`. */
  readonly label: string

  /** Index of the selected logical database. */
  readonly db: number

  connect(): Promise<void>
  disconnect(): Promise<void>
  isConnected(): boolean

  scan(cursor: string, pattern: string, count: number): Promise<ScanPage>

  typeOf(key: string): Promise<KeyType>

  /**
   * Types of `keys` in one round trip, in input order. Rejects with
   * `ResolutionError` if any single lookup failed.
   */
  typeOfMany(keys: readonly string[]): Promise<KeyType[]>

  /** Seconds to live; `-1` without expiry, `-2` when the key is missing. */
  ttl(key: string): Promise<number>

  /** Internal encoding, or `"unknown"` when the key is missing. */
  encoding(key: string): Promise<string>

  /** Soft: `undefined` when the store cannot tell. */
  memoryUsage(key: string): Promise<number | undefined>

  getString(key: string): Promise<string | null>
  getList(key: string, start?: number, end?: number): Promise<string[]>
  getHash(key: string): Promise<Record<string, string>>
  getSet(key: string): Promise<string[]>
  getZset(key: string, start?: number, end?: number): Promise<ZsetEntry[]>

  /** A `ttlSeconds` of zero or less stores the value without expiry. */
  setString(key: string, value: string, ttlSeconds?: number): Promise<void>
  listPush(key: string, values: readonly string[]): Promise<number>
  listSet(key: string, index: number, value: string): Promise<void>
  listRemove(key: string, value: string, count?: number): Promise<number>
  hashSet(key: string, field: string, value: string): Promise<number>
  hashDelete(key: string, fields: readonly string[]): Promise<number>
  setAdd(key: string, members: readonly string[]): Promise<number>
  setRemove(key: string, members: readonly string[]): Promise<number>
  zsetAdd(key: string, member: string, score: number): Promise<number>
  zsetRemove(key: string, members: readonly string[]): Promise<number>

  /** `true` when a key was removed. */
  deleteKey(key: string): Promise<boolean>

  /** `false` when the store refuses, e.g. because `key` does not exist. */
  renameKey(key: string, newKey: string): Promise<boolean>

  /** A negative `ttlSeconds` removes the expiry. */
  setTtl(key: string, ttlSeconds: number): Promise<boolean>

  /** `false` when the store rejects the index. */
  switchDb(index: number): Promise<boolean>

  /** Soft: database index to key count, empty on failure. */
  keyspaceInfo(): Promise<Map<number, number>>

  dbSize(): Promise<number>
  serverInfo(): Promise<ServerInfo>

  /** Runs a whitespace-separated command line and returns printable text. Never rejects. */
  executeCommand(line: string): Promise<string>
}
