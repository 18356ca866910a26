export const keyTypeNames = ["string", "list", "hash", "set", "zset", "none", "unknown"] as const

/**
 * Type of a key as seen by the browser. `none` means the store reports the
 * key does not exist; `unknown` covers store types the browser cannot show
 * (streams, modules) and keys whose type has not been resolved.
 */
export type KeyType = (typeof keyTypeNames)[number]

/** Types that hold a value the session can read and edit. */
export type ValueKeyType = Exclude<KeyType, "none" | "unknown">

export function toKeyType(raw: string): KeyType {
  const lowered = raw.toLowerCase()
  return keyTypeNames.find((name) => name === lowered) ?? "unknown"
}
