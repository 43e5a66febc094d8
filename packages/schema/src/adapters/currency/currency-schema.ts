import { ConfigException, type Parser } from "@tally/config"

import { type AccountSettings, parseAccountSettings } from "../../core/account-settings"
import { InvalidConfigError } from "../../core/errors"
import { VariableSlots } from "../../core/variable-slots"
import type { AccountOwner } from "../../ports/account-owner"
import { AccountLabels, type LabelSelector, type LabelSet } from "../../ports/labels"
import type { Schema, SchemaKind } from "../../ports/schema"
import type { InitialSetup, MigrationSetup } from "../../ports/setups"
import type { Variable } from "../../ports/variable"

export type Currencies = ReadonlyMap<string, AccountSettings>

/**
 * One account per owner and currency.
 *
 * The global schema uses `default-currency`. A use site may fix another
 * currency with its own `currency` key, or leave it empty to require a
 * `currency` variable.
 */
export class CurrencySchema implements Schema {
  readonly kind = "currency"
  private readonly slots = new VariableSlots()
  private currency: string | null

  constructor(
    private readonly currencies: Currencies,
    currency: string | null,
  ) {
    this.currency = currency
    this.slots.define(
      "currency",
      `One of: ${[...currencies.keys()].join(", ")}`,
      (value) => {
        this.currency = this.requireCurrency(value)
      },
      { supplied: currency !== null },
    )
  }

  cloneWithConfig(specific: Parser | null): CurrencySchema {
    if (specific === null) return new CurrencySchema(this.currencies, this.currency)

    const currency = specific.expectString(
      "currency",
      this.currency ?? "",
      `The currency to use. Leave empty to let the player choose.\nOne of: ${[...this.currencies.keys()].join(", ")}`,
    )

    return new CurrencySchema(this.currencies, currency === "" ? null : this.requireCurrency(currency))
  }

  isComplete(): boolean {
    return this.slots.complete
  }

  getRequiredVariables(): readonly Variable[] {
    return this.slots.required()
  }

  getOptionalVariables(): readonly Variable[] {
    return this.slots.optional()
  }

  getSelector(owner: AccountOwner): LabelSelector | null {
    const currency = this.resolved()
    if (!currency) return null

    return {
      entries: {
        [AccountLabels.OWNER_ID]: owner.id,
        [AccountLabels.CURRENCY]: currency.name,
      },
    }
  }

  getOverwriteLabels(owner: AccountOwner): LabelSet | null {
    if (!this.resolved()) return null

    return { [AccountLabels.OWNER_NAME]: owner.name }
  }

  getMigrationSetup(owner: AccountOwner): MigrationSetup | null {
    const currency = this.resolved()
    if (!currency) return null

    const { migration } = currency.settings

    return {
      ...migration,
      labels: {
        [AccountLabels.OWNER_NAME]: owner.name,
        [AccountLabels.CURRENCY]: currency.name,
        [AccountLabels.MIGRATION_SOURCE]: migration.source,
      },
    }
  }

  getInitialSetup(owner: AccountOwner): InitialSetup | null {
    const currency = this.resolved()
    if (!currency) return null

    const { initialBalance, minimumBalance, maximumBalance } = currency.settings

    return {
      initialValue: initialBalance,
      labels: {
        [AccountLabels.OWNER_ID]: owner.id,
        [AccountLabels.OWNER_NAME]: owner.name,
        [AccountLabels.CURRENCY]: currency.name,
        [AccountLabels.VALUE_MIN]: String(minimumBalance),
        [AccountLabels.VALUE_MAX]: String(maximumBalance),
      },
    }
  }

  private resolved(): { name: string; settings: AccountSettings } | null {
    if (this.currency === null) return null

    const settings = this.currencies.get(this.currency)

    return settings ? { name: this.currency, settings } : null
  }

  private requireCurrency(value: unknown): string {
    if (typeof value !== "string" || !this.currencies.has(value)) {
      throw new InvalidConfigError(
        `Unknown currency ${JSON.stringify(value)}; expected one of: ${[...this.currencies.keys()].join(", ")}`,
        { context: { currency: typeof value === "string" ? value : String(value) } },
      )
    }

    return value
  }
}

export const currencySchemaKind: SchemaKind = {
  name: "currency",
  describe: () => "every player has one account per currency",
  build: (globalConfig) => {
    const section = globalConfig.enter("currencies", "Each key here is the name of a currency.")

    if (section.getKeys().length === 0) {
      section.enter("coins", "")
    }

    const currencies = new Map<string, AccountSettings>()

    for (const name of section.getKeys()) {
      currencies.set(name, parseAccountSettings(section.enter(name, "")))
    }

    const [first] = currencies.keys()
    const fallback = first ?? "coins"
    const defaultCurrency = globalConfig.expectString(
      "default-currency",
      fallback,
      "The currency commands use unless they name another.",
    )

    if (!currencies.has(defaultCurrency)) {
      throw new ConfigException(
        `default-currency "${defaultCurrency}" is not one of the configured currencies`,
        { context: { currencies: [...currencies.keys()] } },
      )
    }

    return new CurrencySchema(currencies, defaultCurrency)
  },
}
