export { loadKeyspaceConfig, mapEnvToConfig } from "./load-keyspace-config"
export type { LoadKeyspaceConfigOptions } from "./load-keyspace-config"
export { envSchema } from "./schema"
export type { EnvConfig, KeyspaceConfig } from "./schema"
