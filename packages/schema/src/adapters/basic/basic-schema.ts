import type { Parser } from "@tally/config"

import { type AccountSettings, parseAccountSettings } from "../../core/account-settings"
import type { AccountOwner } from "../../ports/account-owner"
import { AccountLabels, type LabelSelector, type LabelSet } from "../../ports/labels"
import type { Schema, SchemaKind } from "../../ports/schema"
import type { InitialSetup, MigrationSetup } from "../../ports/setups"
import type { Variable } from "../../ports/variable"

/** One account per owner. Needs no variables, so it is always complete. */
export class BasicSchema implements Schema {
  readonly kind = "basic"

  constructor(private readonly settings: AccountSettings) {}

  cloneWithConfig(_specific: Parser | null): BasicSchema {
    return new BasicSchema(this.settings)
  }

  isComplete(): boolean {
    return true
  }

  getRequiredVariables(): readonly Variable[] {
    return []
  }

  getOptionalVariables(): readonly Variable[] {
    return []
  }

  getSelector(owner: AccountOwner): LabelSelector {
    return {
      entries: {
        [AccountLabels.OWNER_ID]: owner.id,
        [AccountLabels.VALUE_MAIN]: "",
      },
    }
  }

  getOverwriteLabels(owner: AccountOwner): LabelSet {
    return { [AccountLabels.OWNER_NAME]: owner.name }
  }

  getMigrationSetup(owner: AccountOwner): MigrationSetup {
    const { migration } = this.settings

    return {
      ...migration,
      labels: {
        [AccountLabels.OWNER_NAME]: owner.name,
        [AccountLabels.MIGRATION_SOURCE]: migration.source,
      },
    }
  }

  getInitialSetup(owner: AccountOwner): InitialSetup {
    const { initialBalance, minimumBalance, maximumBalance } = this.settings

    return {
      initialValue: initialBalance,
      labels: {
        [AccountLabels.OWNER_ID]: owner.id,
        [AccountLabels.OWNER_NAME]: owner.name,
        [AccountLabels.VALUE_MAIN]: "1",
        [AccountLabels.VALUE_MIN]: String(minimumBalance),
        [AccountLabels.VALUE_MAX]: String(maximumBalance),
      },
    }
  }
}

export const basicSchemaKind: SchemaKind = {
  name: "basic",
  describe: () => "every player has one account",
  build: (globalConfig) => new BasicSchema(parseAccountSettings(globalConfig)),
}
