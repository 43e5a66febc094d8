import type { Logger } from "@tally/logger"
import { ServiceRegistry } from "@tally/registry"

import { type AppConfig, loadAppConfig } from "./config"
import { registerServices, type ServiceOverrides } from "./services"
import { createCoreServices } from "./services/core"

export type AppContextOptions = {
  env?: NodeJS.ProcessEnv
  cwd?: string
  logger?: Logger
  serviceOverrides?: ServiceOverrides
}

export type AppContext = {
  config: AppConfig
  logger: Logger
  registry: ServiceRegistry
}

export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const config = await loadAppConfig(options.env ?? process.env, options.cwd)
  const logger = options.logger ?? createCoreServices(config).logger
  const registry = new ServiceRegistry()

  registerServices(registry, config, logger, options.serviceOverrides)

  return { config, logger, registry }
}
