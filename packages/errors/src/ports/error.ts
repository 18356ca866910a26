export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error (keys, cursors, patterns...).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` when repeating the same call may succeed (e.g. a dropped connection). */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (store unreachable, scan aborted),
   * `false` for programmer errors such as a non-positive page size.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape for log payloads.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isRetryable: boolean
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
