import { ConfigLoader, type DocumentStore, FsDocumentStore } from "@tally/config"
import type { Logger } from "@tally/logger"
import { type ServiceRegistry, ServiceRegistryToken } from "@tally/registry"
import { createSchemaKindRegistry, SchemaKindRegistryToken } from "@tally/schema"

import type { AppConfig } from "../config"
import { CONFIG_HEADER, configModules } from "../config-modules"
import { ConfigLoaderToken, DocumentStoreToken, LoggerToken } from "./tokens"

export { ConfigLoaderToken, DocumentStoreToken, LoggerToken } from "./tokens"

export type ServiceOverrides = {
  /** Replaces the data-directory store, e.g. with a `MemoryDocumentStore` in tests. */
  store?: DocumentStore
}

export function registerServices(
  registry: ServiceRegistry,
  config: AppConfig,
  logger: Logger,
  overrides: ServiceOverrides = {},
): void {
  registry.store(LoggerToken, logger)
  registry.store(SchemaKindRegistryToken, createSchemaKindRegistry())

  registry.provide(DocumentStoreToken, {
    deps: [],
    create: () => overrides.store ?? new FsDocumentStore({ dir: config.storage.dataDir }),
  })

  registry.provide(ConfigLoaderToken, {
    deps: [ServiceRegistryToken, DocumentStoreToken, LoggerToken],
    create: (services, store, log) =>
      new ConfigLoader({
        modules: configModules,
        store,
        registry: services,
        logger: log.child({ module: "config", configFile: config.storage.configFile }),
        file: config.storage.configFile,
        header: CONFIG_HEADER,
      }),
  })
}
