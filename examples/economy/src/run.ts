import { toAppError } from "@tally/errors"
import { SchemaConfig } from "@tally/schema"

import { type AppContextOptions, createAppContext } from "./app/create-context"
import { ConfigLoaderToken } from "./app/services"
import { TransferConfig } from "./domains/transfer/config/transfer-config"

export type RunResult = {
  schema: SchemaConfig
  transfer: TransferConfig
}

/** Loads every config module once, logs what was loaded and shuts the registry down. */
export async function run(options: AppContextOptions = {}): Promise<RunResult> {
  const { logger, registry } = await createAppContext(options)

  try {
    const loader = await registry.get(ConfigLoaderToken)
    const [schema, transfer] = await Promise.all([
      loader.loadConfig(SchemaConfig),
      loader.loadConfig(TransferConfig),
    ])

    logger.info("Economy config loaded", {
      schema: schema.kind.name,
      commands: transfer.methods.map((method) => method.command),
    })

    return { schema, transfer }
  } finally {
    await registry.shutdown().catch((err: unknown) => {
      logger.error("Shutdown failed", { err: toAppError(err) })
    })
  }
}
