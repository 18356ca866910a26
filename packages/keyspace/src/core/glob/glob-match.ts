/**
 * Matches `text` against a store-style glob: `*`, `?`, `[abc]`, `[^abc]`,
 * `[a-z]` and `\` escapes. Matching is case-sensitive and works on UTF-16
 * code units.
 */
export function globMatch(pattern: string, text: string): boolean {
  return matchFrom(pattern, 0, text, 0)
}

function matchFrom(pattern: string, p: number, text: string, t: number): boolean {
  while (p < pattern.length) {
    const ch = pattern[p]

    switch (ch) {
      case "*": {
        while (pattern[p + 1] === "*") p++
        if (p + 1 === pattern.length) return true
        for (let i = t; i <= text.length; i++) {
          if (matchFrom(pattern, p + 1, text, i)) return true
        }
        return false
      }

      case "?":
        if (t >= text.length) return false
        t++
        p++
        break

      case "[": {
        if (t >= text.length) return false
        const result = matchClass(pattern, p + 1, text.charCodeAt(t))
        if (!result.matched) return false
        p = result.next
        t++
        break
      }

      case "\\":
        if (p + 1 < pattern.length) p++
        if (t >= text.length || pattern[p] !== text[t]) return false
        t++
        p++
        break

      default:
        if (t >= text.length || ch !== text[t]) return false
        t++
        p++
    }
  }

  return t === text.length
}

/**
 * Evaluates a bracket class starting right after `[`. An unterminated class
 * runs to the end of the pattern.
 */
function matchClass(pattern: string, start: number, code: number): { matched: boolean; next: number } {
  let p = start
  const negate = pattern[p] === "^"
  if (negate) p++

  let matched = false

  while (p < pattern.length && pattern[p] !== "]") {
    if (pattern[p] === "\\" && p + 1 < pattern.length) {
      p++
      if (pattern.charCodeAt(p) === code) matched = true
      p++
      continue
    }

    if (pattern[p + 1] === "-" && p + 2 < pattern.length && pattern[p + 2] !== "]") {
      let lo = pattern.charCodeAt(p)
      let hi = pattern.charCodeAt(p + 2)
      if (lo > hi) [lo, hi] = [hi, lo]
      if (code >= lo && code <= hi) matched = true
      p += 3
      continue
    }

    if (pattern.charCodeAt(p) === code) matched = true
    p++
  }

  // skip the closing bracket when present
  const next = p < pattern.length ? p + 1 : p

  return { matched: negate ? !matched : matched, next }
}
