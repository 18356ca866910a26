import type { ZsetEntry } from "./data-source"
import type { KeyType } from "./key-type"

export type KeyValue =
  | { kind: "string"; value: string | null }
  | { kind: "list"; value: string[] }
  | { kind: "hash"; value: Record<string, string> }
  | { kind: "set"; value: string[] }
  | { kind: "zset"; value: ZsetEntry[] }
  | { kind: "none" }

export type KeyDetail = {
  key: string
  type: KeyType
  /** `true` when the type came from a pending virtual key. */
  virtual: boolean
  ttl: number
  encoding: string
  memoryUsage?: number
  value: KeyValue
}
