import type { ValueKeyType } from "../../ports/key-type"

export type MemoryValue =
  | { type: "string"; value: string }
  | { type: "list"; value: string[] }
  | { type: "hash"; value: Map<string, string> }
  | { type: "set"; value: Set<string> }
  | { type: "zset"; value: Map<string, number> }

export type MemoryValueOf<T extends ValueKeyType> = Extract<MemoryValue, { type: T }>

const integerPattern = /^-?\d+$/

/** Collections without members do not exist, as in the real store. */
export function isEmptyValue(entry: MemoryValue): boolean {
  switch (entry.type) {
    case "string":
      return false
    case "list":
      return entry.value.length === 0
    default:
      return entry.value.size === 0
  }
}

/** Encoding the store reports for small values of each type. */
export function encodingOf(entry: MemoryValue): string {
  switch (entry.type) {
    case "string":
      if (integerPattern.test(entry.value)) return "int"
      return entry.value.length <= 44 ? "embstr" : "raw"
    case "set":
      return [...entry.value].every((m) => integerPattern.test(m)) ? "intset" : "listpack"
    default:
      return "listpack"
  }
}

/** Rough byte size: payload plus a fixed per-key overhead. */
export function approximateSize(key: string, entry: MemoryValue): number {
  const overhead = 48 + Buffer.byteLength(key)

  switch (entry.type) {
    case "string":
      return overhead + Buffer.byteLength(entry.value)
    case "list":
    case "set":
      return overhead + sumBytes(entry.value)
    case "hash":
      return overhead + sumBytes(entry.value.keys()) + sumBytes(entry.value.values())
    case "zset":
      return overhead + sumBytes(entry.value.keys()) + entry.value.size * 8
  }
}

function sumBytes(items: Iterable<string>): number {
  let total = 0
  for (const item of items) total += Buffer.byteLength(item)
  return total
}

/** Inclusive range with negative indexes counted from the end, as in LRANGE. */
export function sliceRange<T>(items: readonly T[], start: number, end: number): T[] {
  const n = items.length
  const from = start < 0 ? Math.max(n + start, 0) : start
  const to = end < 0 ? n + end : Math.min(end, n - 1)

  if (from > to || from >= n) return []
  return items.slice(from, to + 1)
}

export function sortedZset(entry: Map<string, number>): { member: string; score: number }[] {
  return [...entry]
    .map(([member, score]) => ({ member, score }))
    .sort((a, b) => a.score - b.score || (a.member < b.member ? -1 : a.member > b.member ? 1 : 0))
}
