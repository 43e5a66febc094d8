import type { Parser } from "@tally/config"

import type { AccountOwner } from "./account-owner"
import type { LabelSelector, LabelSet } from "./labels"
import type { InitialSetup, MigrationSetup } from "./setups"
import type { Variable } from "./variable"

/**
 * Describes which account of an owner a feature works with, and how that
 * account is created or migrated.
 *
 * A schema may need {@link Variable}s supplied before it can answer. Every
 * `get*` method returns `null` until {@link Schema.isComplete} is `true`, and
 * the same answer on every call afterwards.
 */
export interface Schema {
  /** Name of the {@link SchemaKind} that built this schema. */
  readonly kind: string

  /**
   * A new, independent schema with `specific` layered over this one's config.
   * `null` copies this schema.
   *
   * @throws InvalidConfigError if `specific` holds invalid overrides.
   */
  cloneWithConfig(specific: Parser | null): Schema

  isComplete(): boolean
  getRequiredVariables(): readonly Variable[]
  getOptionalVariables(): readonly Variable[]

  getSelector(owner: AccountOwner): LabelSelector | null
  getOverwriteLabels(owner: AccountOwner): LabelSet | null
  getMigrationSetup(owner: AccountOwner): MigrationSetup | null
  getInitialSetup(owner: AccountOwner): InitialSetup | null
}

export interface SchemaKind {
  /** Value of `schema.type` that selects this kind. */
  readonly name: string

  /** One line shown in the generated documentation of `schema.type`. */
  describe(): string

  /** Builds the global schema from the `schema` section. */
  build(globalConfig: Parser): Schema
}
