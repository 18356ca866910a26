import type { Logger } from "@keyscope/logger"
import { PinoLogger } from "@keyscope/logger"
import { RedisKeyspaceDataSource } from "../adapters/redis/redis-data-source"
import { createRedisClient } from "../adapters/redis/redis-client"
import { KeyspaceSession } from "../core/session/keyspace-session"
import type { KeyspaceDataSource } from "../ports/data-source"
import { type KeyspaceConfig, loadKeyspaceConfig } from "./config"

export type KeyspaceContextOptions = {
  env?: Record<string, string | undefined>
  dotenvFile?: string
  cwd?: string
  /** Raw configuration values applied last. */
  configOverrides?: Record<string, unknown>
  overrides?: {
    source?: KeyspaceDataSource
    logger?: Logger
  }
}

export type KeyspaceContext = {
  config: KeyspaceConfig
  logger: Logger
  source: KeyspaceDataSource
  session: KeyspaceSession
  start(): Promise<void>
  stop(): Promise<void>
}

export async function createKeyspaceContext(options: KeyspaceContextOptions = {}): Promise<KeyspaceContext> {
  const config = await loadKeyspaceConfig({
    ...(options.env !== undefined && { env: options.env }),
    ...(options.dotenvFile !== undefined && { dotenvFile: options.dotenvFile }),
    ...(options.cwd !== undefined && { cwd: options.cwd }),
    ...(options.configOverrides !== undefined && { overrides: options.configOverrides }),
  })

  const logger =
    options.overrides?.logger ??
    new PinoLogger(
      {},
      { level: config.logging.level, prettify: config.logging.prettify },
      { service: config.logging.serviceName, env: config.app.env },
    )

  const source =
    options.overrides?.source ??
    new RedisKeyspaceDataSource(
      { client: createRedisClient(config.redis), logger },
      { url: config.redis.url, database: config.redis.database },
    )

  const session = new KeyspaceSession({ source, logger }, config.keyspace)

  return {
    config,
    logger,
    source,
    session,
    async start() {
      await source.connect()
      logger.info("Keyspace session started", { session: source.label })
    },
    async stop() {
      await source.disconnect()
      logger.info("Keyspace session stopped", { session: source.label })
    },
  }
}
