import { errorKind } from "@tally/errors"
import { createToken } from "@tally/registry"

import type { SchemaKind } from "../ports/schema"

const SchemaKindDuplicate = errorKind("schema_kind_duplicate", { isOperational: false })

/**
 * The closed table of schema kinds selectable through `schema.type`. The
 * first kind is the fallback for unknown types and fresh documents.
 */
export class SchemaKindRegistry {
  readonly fallback: SchemaKind
  private readonly kinds = new Map<string, SchemaKind>()

  constructor(kinds: readonly [SchemaKind, ...SchemaKind[]]) {
    this.fallback = kinds[0]

    for (const kind of kinds) {
      if (this.kinds.has(kind.name)) {
        throw SchemaKindDuplicate.create(`Schema kind "${kind.name}" is registered twice`, {
          context: { kind: kind.name },
        })
      }

      this.kinds.set(kind.name, kind)
    }
  }

  get(name: string): SchemaKind | undefined {
    return this.kinds.get(name)
  }

  names(): string[] {
    return [...this.kinds.keys()]
  }

  /** One `name: description` line per kind. */
  describe(): string {
    return [...this.kinds.values()].map((kind) => `${kind.name}: ${kind.describe()}`).join("\n")
  }
}

export const SchemaKindRegistryToken = createToken<SchemaKindRegistry>("SchemaKindRegistry")
