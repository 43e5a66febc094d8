import { createPinoLogger, type Logger } from "@tally/logger"

import type { AppConfig } from "../config"

export type CoreServices = {
  logger: Logger
}

export function createCoreServices(config: AppConfig): CoreServices {
  const logger = createPinoLogger(
    {},
    {
      level: config.logging.level,
      prettify: config.logging.prettify,
    },
    { service: config.logging.serviceName, env: config.app.env },
  )

  return { logger }
}
