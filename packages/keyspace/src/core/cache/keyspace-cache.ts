import type { KeyType } from "../../ports/key-type"
import { isTerminalCursor, type ScanCursor, TERMINAL_CURSOR } from "../../ports/scan-cursor"

export type KeyspaceSnapshot = {
  readonly keys: readonly string[]
  readonly types: ReadonlyMap<string, KeyType>
  readonly cursor: ScanCursor
  readonly pattern: string
}

/**
 * Every key discovered since the last reset, in discovery order and without
 * duplicates, with the scan position to continue from.
 */
export class KeyspaceCache {
  private keys: string[] = []
  private readonly index = new Set<string>()
  private readonly types = new Map<string, KeyType>()
  private cursorValue: ScanCursor = TERMINAL_CURSOR
  private patternValue = "*"

  get cursor(): ScanCursor {
    return this.cursorValue
  }

  get pattern(): string {
    return this.patternValue
  }

  get size(): number {
    return this.keys.length
  }

  /** `true` while the scan for the current pattern has not completed. */
  get hasMore(): boolean {
    return !isTerminalCursor(this.cursorValue)
  }

  reset(pattern: string = this.patternValue): void {
    this.keys = []
    this.index.clear()
    this.types.clear()
    this.cursorValue = TERMINAL_CURSOR
    this.patternValue = pattern
  }

  /**
   * Appends unseen keys, overwrites the type of every key in `newTypes` and
   * moves the cursor. Merging the same batch twice is a no-op the second time.
   */
  merge(newKeys: readonly string[], newTypes: ReadonlyMap<string, KeyType>, nextCursor: ScanCursor): void {
    for (const key of newKeys) {
      if (this.index.has(key)) continue
      this.index.add(key)
      this.keys.push(key)
    }

    for (const [key, type] of newTypes) {
      this.types.set(key, type)
    }

    this.cursorValue = nextCursor
  }

  has(key: string): boolean {
    return this.index.has(key)
  }

  typeOf(key: string): KeyType | undefined {
    return this.types.get(key)
  }

  /** Drops a key known to be gone without rescanning. */
  forget(key: string): boolean {
    if (!this.index.delete(key)) return false

    this.keys = this.keys.filter((k) => k !== key)
    this.types.delete(key)
    return true
  }

  snapshot(): KeyspaceSnapshot {
    return {
      keys: [...this.keys],
      types: new Map(this.types),
      cursor: this.cursorValue,
      pattern: this.patternValue,
    }
  }
}
