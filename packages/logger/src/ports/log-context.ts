/**
 * Fields every keyspace log line may carry. Bound through `child()` or
 * passed per call.
 */
export type LogContext = {
  /** Connection label of the session, e.g. `localhost:6379/db0`. */
  session: string
  db: number
  pattern: string
  cursor: string
  key: string

  service: string
  module: string
  env: string
}

type LogOutcome = {
  count: number
  durationMs: number
}

type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogOutcome> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
