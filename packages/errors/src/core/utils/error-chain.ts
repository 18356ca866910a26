function causeOf(value: unknown): unknown {
  if (typeof value !== "object" || value === null || !("cause" in value)) return undefined
  return value.cause
}

/**
 * Walk the `cause` links of a thrown value, outermost first.
 *
 * Stops at `maxDepth` entries or when a value repeats.
 *
 * @example
 * ```ts
 * const messages = errorChain(err).map((e) => (e instanceof Error ? e.message : String(e)))
 * ```
 */
export function errorChain(err: unknown, maxDepth: number = 50): unknown[] {
  const chain: unknown[] = []
  const seen = new WeakSet<object>()

  let current: unknown = err

  while (current != null && chain.length < maxDepth) {
    if (typeof current === "object") {
      if (seen.has(current)) break
      seen.add(current)
    }

    chain.push(current)

    const next = causeOf(current)
    if (next === undefined) break
    current = next
  }

  return chain
}
