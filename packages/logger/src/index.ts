export type { LogContext, LogContextPatch, LogMeta } from "./ports/log-context"
export { isLogLevelName, logLevelNames, LogLevels } from "./ports/log-level"
export type { LogLevel, LogLevelName } from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
export { createPinoLogger, PinoLogger } from "./adapters/pino/pino-logger"
export type { PinoLoggerDeps } from "./adapters/pino/pino-logger"
export { createNullLogger, NullLogger } from "./adapters/null/null-logger"
