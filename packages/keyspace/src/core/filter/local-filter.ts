/**
 * Keys whose lower-cased form contains the lower-cased `text`. An empty
 * `text` returns `keys` itself.
 */
export function filterKeys(keys: readonly string[], text: string): readonly string[] {
  if (text === "") return keys

  const needle = text.toLowerCase()
  return keys.filter((key) => key.toLowerCase().includes(needle))
}
