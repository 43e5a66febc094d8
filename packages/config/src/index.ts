export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { FsDocumentStore, type FsDocumentStoreOptions } from "./adapters/fs/fs-document-store"
export { MemoryDocumentStore } from "./adapters/memory/memory-document-store"
export { ConfigDocument, type ConfigRepair } from "./core/document/config-document"
export {
  ConfigException,
  ConfigLoadError,
  DocumentNameInvalid,
  DocumentNotFound,
  RegistrationError,
  SettingsInvalid,
  TypeMismatchError,
} from "./core/errors"
export {
  ConfigLoader,
  type ConfigLoaderOptions,
  DEFAULT_CONFIG_FILE,
  type LoadedConfigs,
  type LoadState,
} from "./core/loader/config-loader"
export { DOC_PREFIX, Parser } from "./core/parser/parser"
export { loadSettings, type LoadSettingsOptions } from "./core/settings/load-settings"
export { parseYamlDocument, stringifyYamlDocument } from "./core/yaml/yaml-codec"
export type { ConfigModule, ConfigPass } from "./ports/config-module"
export type { ConfigMap, ConfigScalar, ConfigValue } from "./ports/config-value"
export type { DocumentStore } from "./ports/document-store"
export type { Settings } from "./ports/settings"
export type { ConfigSource } from "./ports/source"
