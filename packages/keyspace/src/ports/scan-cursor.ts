/**
 * Opaque token handed back by the store's incremental scan. Only equality
 * with {@link TERMINAL_CURSOR} carries meaning.
 */
export type ScanCursor = string

export const TERMINAL_CURSOR: ScanCursor = "0"

export function isTerminalCursor(cursor: ScanCursor): boolean {
  return cursor === TERMINAL_CURSOR
}
