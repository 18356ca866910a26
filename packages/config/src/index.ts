export type { IConfig } from "./ports/config"
export type { ConfigSource } from "./ports/source"
export { Config } from "./core/config"
export { loadConfig } from "./core/load"
export type { LoadConfigOptions } from "./core/load"
export { ConfigValidationError } from "./core/errors/config-errors"
export { EnvSource } from "./adapters/env/env-source"
export type { EnvSourceOptions } from "./adapters/env/env-source"
export { DotenvSource } from "./adapters/dotenv/dotenv-source"
export type { DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { ObjectSource } from "./adapters/object/object-source"
