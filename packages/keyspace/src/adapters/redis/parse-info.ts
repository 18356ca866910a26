import type { ServerInfo } from "../../ports/data-source"

/**
 * Parses `INFO` text into sections. Section names are lower-cased; fields
 * before the first header land in `"default"`.
 */
export function parseInfo(raw: string): ServerInfo {
  const info: ServerInfo = {}
  let section = "default"

  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim()
    if (trimmed === "") continue

    if (trimmed.startsWith("#")) {
      section = trimmed.slice(1).trim().toLowerCase()
      info[section] ??= {}
      continue
    }

    const sep = trimmed.indexOf(":")
    if (sep <= 0) continue

    const fields = (info[section] ??= {})
    fields[trimmed.slice(0, sep)] = trimmed.slice(sep + 1)
  }

  return info
}

/** `db3:keys=12,expires=0,avg_ttl=0` entries to a database index to key count map. */
export function parseKeyspaceCounts(section: Readonly<Record<string, string>> = {}): Map<number, number> {
  const counts = new Map<number, number>()

  for (const [name, value] of Object.entries(section)) {
    const db = /^db(\d+)$/.exec(name)?.[1]
    if (db === undefined) continue

    const keys = /(?:^|,)keys=(\d+)/.exec(value)?.[1]
    counts.set(Number(db), keys === undefined ? 0 : Number(keys))
  }

  return counts
}
