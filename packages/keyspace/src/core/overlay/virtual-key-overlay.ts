import type { KeyType, ValueKeyType } from "../../ports/key-type"
import { globMatch } from "../glob/glob-match"

export type OverlayView = {
  keys: string[]
  types: Map<string, KeyType>
}

/**
 * Keys created in the client that the store does not know about yet, such
 * as an empty hash the operator is about to fill in.
 */
export class VirtualKeyOverlay {
  private readonly pending = new Map<string, ValueKeyType>()

  get size(): number {
    return this.pending.size
  }

  /** Registers `key`; declaring it again replaces the intended type. */
  declare(key: string, type: ValueKeyType): void {
    this.pending.set(key, type)
  }

  /**
   * Drops `key` once the store reports it with a real type. Returns whether
   * an entry was removed.
   */
  confirm(key: string, reportedType: KeyType): boolean {
    if (reportedType === "none") return false
    return this.pending.delete(key)
  }

  remove(key: string): boolean {
    return this.pending.delete(key)
  }

  has(key: string): boolean {
    return this.pending.has(key)
  }

  typeFor(key: string): ValueKeyType | undefined {
    return this.pending.get(key)
  }

  clear(): void {
    this.pending.clear()
  }

  /**
   * Returns the cache view with pending keys folded in: keys matching
   * `pattern` that the cache lacks are appended, and cached pending keys that
   * resolved to `none` or to nothing take the declared type. The inputs are
   * not modified.
   */
  merge(pattern: string, cacheKeys: readonly string[], cacheTypes: ReadonlyMap<string, KeyType>): OverlayView {
    const keys = [...cacheKeys]
    const types = new Map(cacheTypes)

    if (this.pending.size === 0) return { keys, types }

    const present = new Set(cacheKeys)

    for (const [key, declared] of this.pending) {
      if (present.has(key)) {
        const resolved = types.get(key)
        if (resolved === undefined || resolved === "none") types.set(key, declared)
        continue
      }

      if (globMatch(pattern, key)) {
        keys.push(key)
        types.set(key, declared)
      }
    }

    return { keys, types }
  }
}
