import { type ConfigSource, DotenvSource, EnvSource, loadConfig, ObjectSource } from "@keyscope/config"
import { type EnvConfig, envSchema, type KeyspaceConfig } from "./schema"

export function mapEnvToConfig(env: EnvConfig): KeyspaceConfig {
  return {
    app: {
      env: env.APP_ENV,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
    redis: {
      url: env.REDIS_URL,
      database: env.REDIS_DB,
      connectTimeoutMs: env.REDIS_CONNECT_TIMEOUT_MS,
    },
    keyspace: {
      pageLimit: env.KEYSPACE_PAGE_SIZE,
      scanFloor: env.KEYSPACE_SCAN_FLOOR,
      typeBatchSize: env.KEYSPACE_TYPE_BATCH_SIZE,
      separator: env.KEYSPACE_SEPARATOR,
    },
  }
}

export type LoadKeyspaceConfigOptions = {
  env?: Record<string, string | undefined>
  /** Optional dotenv file read before the environment. @default ".env" */
  dotenvFile?: string
  cwd?: string
  /** Raw values applied after every other source, e.g. `{ REDIS_DB: "3" }`. */
  overrides?: Record<string, unknown>
}

export async function loadKeyspaceConfig(options: LoadKeyspaceConfigOptions = {}): Promise<KeyspaceConfig> {
  const sources: ConfigSource[] = [
    new DotenvSource({ file: options.dotenvFile ?? ".env", required: false, ...(options.cwd !== undefined && { cwd: options.cwd }) }),
    new EnvSource({ env: options.env ?? process.env }),
  ]

  if (options.overrides) sources.push(new ObjectSource(options.overrides))

  const result = await loadConfig({ schema: envSchema, sources })

  return mapEnvToConfig(result.value)
}
