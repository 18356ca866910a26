/**
 * Renders a raw command reply the way an interactive console prints it.
 */
export function formatReply(reply: unknown): string {
  if (reply === null || reply === undefined) return "(nil)"

  if (Array.isArray(reply)) {
    if (reply.length === 0) return "(empty list)"
    return reply.map((item, i) => `${i + 1}) ${formatScalar(item)}`).join("\n")
  }

  if (reply instanceof Map) {
    return [...reply].map(([k, v]) => `${formatScalar(k)}: ${formatScalar(v)}`).join("\n")
  }

  if (typeof reply === "boolean") return reply ? "OK" : "(error)"

  if (reply instanceof Uint8Array) return Buffer.from(reply).toString("utf8")

  if (typeof reply === "object") {
    return Object.entries(reply)
      .map(([k, v]) => `${k}: ${formatScalar(v)}`)
      .join("\n")
  }

  return String(reply)
}

export function formatErrorReply(err: unknown): string {
  return `(error) ${err instanceof Error ? err.message : String(err)}`
}

function formatScalar(value: unknown): string {
  if (value === null || value === undefined) return "(nil)"
  if (value instanceof Uint8Array) return Buffer.from(value).toString("utf8")
  if (Array.isArray(value)) return value.map(formatScalar).join(" ")
  return String(value)
}

/** Splits a console line into command arguments; blank input gives none. */
export function tokenizeCommand(line: string): string[] {
  const trimmed = line.trim()
  return trimmed === "" ? [] : trimmed.split(/\s+/)
}
