import type { Parser } from "@tally/config"
import type { ServiceRegistry } from "@tally/registry"

import type { Schema, SchemaKind } from "../ports/schema"
import { SchemaKindRegistryToken } from "./schema-kind-registry"

/** The `schema` section: which kind of accounts the economy uses. */
export class SchemaConfig {
  constructor(
    readonly kind: SchemaKind,
    readonly schema: Schema,
  ) {}

  static async parse(parser: Parser, registry: ServiceRegistry): Promise<SchemaConfig> {
    const kinds = await registry.get(SchemaKindRegistryToken)
    const section = parser.enter(
      "schema",
      "The account layout. Changing it on a running server may hide existing balances.",
    )
    const type = section.expectString(
      "type",
      kinds.fallback.name,
      `The kind of accounts to use:\n${kinds.describe()}`,
    )
    const kind =
      kinds.get(type) ??
      section.failSafe(
        kinds.fallback,
        `Unknown schema type "${type}", expected one of: ${kinds.names().join(", ")}. Using "${kinds.fallback.name}".`,
      )

    return new SchemaConfig(kind, kind.build(section))
  }
}
