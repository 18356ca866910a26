import type { ScanCursor } from "./scan-cursor"

/**
 * One page of keys plus the cursor to continue from.
 *
 * Keys may repeat across pages and, for the paginator, within a page.
 */
export type ScanPage = {
  cursor: ScanCursor
  keys: string[]
}
