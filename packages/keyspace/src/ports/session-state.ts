export type SessionState = "empty" | "loading" | "ready" | "filtered" | "loading_more"

/** One entry of the database picker. */
export type DatabaseOption = {
  index: number
  keyCount: number
  /** `DB 3 (120)`, or `DB 3` when empty. */
  label: string
}
