import { type LogLevelName, logLevelNames } from "@keyscope/logger"
import { z } from "zod"

export const envSchema = z.object({
  APP_ENV: z.string().default("development"),
  SERVICE_NAME: z.string().default("keyscope"),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),

  REDIS_URL: z.string().default("redis://localhost:6379"),
  REDIS_DB: z.coerce.number().int().min(0).default(0),
  REDIS_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  KEYSPACE_PAGE_SIZE: z.coerce.number().int().positive().default(2000),
  KEYSPACE_SCAN_FLOOR: z.coerce.number().int().positive().default(10),
  KEYSPACE_TYPE_BATCH_SIZE: z.coerce.number().int().positive().default(1000),
  KEYSPACE_SEPARATOR: z.string().min(1).default(":"),
})

export type EnvConfig = z.infer<typeof envSchema>

export type KeyspaceConfig = {
  app: {
    env: string
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }

  redis: {
    url: string
    database: number
    connectTimeoutMs: number
  }

  keyspace: {
    pageLimit: number
    scanFloor: number
    typeBatchSize: number
    separator: string
  }
}
