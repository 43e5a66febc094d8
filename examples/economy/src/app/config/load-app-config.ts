import path from "node:path"
import { type ConfigSource, DotenvSource, EnvSource, loadSettings } from "@tally/config"

import { type AppConfig, type EnvConfig, envSchema } from "./schema"

export function mapEnvToConfig(env: EnvConfig, cwd: string): AppConfig {
  return {
    app: {
      env: env.APP_ENV,
    },
    storage: {
      dataDir: path.resolve(cwd, env.DATA_DIR),
      configFile: env.CONFIG_FILE,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
  }
}

export async function loadAppConfig(
  env: NodeJS.ProcessEnv,
  cwd: string = process.cwd(),
): Promise<AppConfig> {
  const sources: ConfigSource[] = [
    new DotenvSource({ file: `.env.${env.NODE_ENV ?? "development"}`, required: false, cwd }),
    new EnvSource({ env }),
  ]

  const settings = await loadSettings({ schema: envSchema, sources })

  return mapEnvToConfig(settings.value, cwd)
}
