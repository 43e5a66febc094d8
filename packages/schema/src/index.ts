export { BasicSchema, basicSchemaKind } from "./adapters/basic/basic-schema"
export { createSchemaKindRegistry } from "./adapters/create"
export { type Currencies, CurrencySchema, currencySchemaKind } from "./adapters/currency/currency-schema"
export {
  type AccountSettings,
  type MigrationSettings,
  parseAccountSettings,
} from "./core/account-settings"
export { InvalidConfigError, VariableAlreadySuppliedError } from "./core/errors"
export { SchemaConfig } from "./core/schema-config"
export { SchemaKindRegistry, SchemaKindRegistryToken } from "./core/schema-kind-registry"
export { type SlotOptions, VariableSlots } from "./core/variable-slots"
export type { AccountOwner } from "./ports/account-owner"
export { AccountLabels, type LabelSelector, type LabelSet, OracleNames } from "./ports/labels"
export type { Schema, SchemaKind } from "./ports/schema"
export type { InitialSetup, MigrationSetup } from "./ports/setups"
export type { Variable } from "./ports/variable"

