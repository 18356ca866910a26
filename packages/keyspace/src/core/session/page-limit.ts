export const DEFAULT_PAGE_LIMIT = 2000
export const MIN_PAGE_LIMIT = 10
export const MAX_PAGE_LIMIT = 1_000_000

/**
 * Parses the page-size input. Blank or non-integer text falls back to
 * {@link DEFAULT_PAGE_LIMIT}; numbers are truncated and clamped to
 * `[MIN_PAGE_LIMIT, MAX_PAGE_LIMIT]`.
 */
export function parsePageLimit(raw: string | number | undefined): number {
  if (raw === undefined) return DEFAULT_PAGE_LIMIT

  let value: number

  if (typeof raw === "number") {
    if (!Number.isFinite(raw)) return DEFAULT_PAGE_LIMIT
    value = Math.trunc(raw)
  } else {
    const text = raw.trim()
    if (!/^[+-]?\d+$/.test(text)) return DEFAULT_PAGE_LIMIT
    value = Number.parseInt(text, 10)
  }

  return Math.max(MIN_PAGE_LIMIT, Math.min(value, MAX_PAGE_LIMIT))
}
