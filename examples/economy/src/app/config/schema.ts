import { type LogLevelName, logLevelNames } from "@tally/logger"
import { z } from "zod"

export const envSchema = z.object({
  APP_ENV: z.string().default("development"),
  SERVICE_NAME: z.string().default("tally-economy"),

  DATA_DIR: z.string().default("data"),
  CONFIG_FILE: z.string().default("config.yml"),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type EnvConfig = z.infer<typeof envSchema>

export type AppConfig = {
  app: {
    env: string
  }

  storage: {
    /** Absolute directory holding the config document and its backups. */
    dataDir: string
    configFile: string
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }
}
