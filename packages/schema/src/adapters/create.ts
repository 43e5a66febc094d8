import { SchemaKindRegistry } from "../core/schema-kind-registry"
import { basicSchemaKind } from "./basic/basic-schema"
import { currencySchemaKind } from "./currency/currency-schema"

/** The kinds `schema.type` can name, `basic` first. */
export function createSchemaKindRegistry(): SchemaKindRegistry {
  return new SchemaKindRegistry([basicSchemaKind, currencySchemaKind])
}
