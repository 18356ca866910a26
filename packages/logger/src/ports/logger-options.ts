import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /**
   * Minimum level to emit. `"info"` drops trace and debug entries.
   */
  level: LogLevelName

  /**
   * Render human-readable lines through pino-pretty instead of JSON.
   * Meant for local runs; ignored when an explicit destination is given.
   */
  prettify?: boolean
}
