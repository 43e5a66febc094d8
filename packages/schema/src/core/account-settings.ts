import type { Parser } from "@tally/config"

export interface MigrationSettings {
  enabled: boolean
  source: string
  multiplier: number
}

/** Balance rules of one kind of account (the basic account, or one currency). */
export interface AccountSettings {
  initialBalance: number
  minimumBalance: number
  maximumBalance: number
  migration: MigrationSettings
}

export function parseAccountSettings(parser: Parser): AccountSettings {
  const minimumBalance = parser.expectInt("minimum-balance", 0, "The lowest balance an account may have.")
  let maximumBalance = parser.expectInt(
    "maximum-balance",
    1_000_000,
    "The highest balance an account may have.",
  )

  if (maximumBalance < minimumBalance) {
    maximumBalance = parser.setValue(
      "maximum-balance",
      minimumBalance,
      "maximum-balance must not be lower than minimum-balance.",
    )
  }

  let initialBalance = parser.expectInt(
    "initial-balance",
    Math.min(Math.max(100, minimumBalance), maximumBalance),
    "The balance a new account starts with.",
  )

  if (initialBalance < minimumBalance || initialBalance > maximumBalance) {
    initialBalance = parser.setValue(
      "initial-balance",
      Math.min(Math.max(initialBalance, minimumBalance), maximumBalance),
      "initial-balance must lie between minimum-balance and maximum-balance.",
    )
  }

  const migration = parser.enter("migration", "Import balances from another economy on first use.")

  return {
    initialBalance,
    minimumBalance,
    maximumBalance,
    migration: {
      enabled: migration.expectBool("enabled", true, "Whether to import balances."),
      source: migration.expectString("source", "legacy", "Name of the economy to import from."),
      multiplier: migration.expectNumber(
        "multiplier",
        1,
        "Imported balances are multiplied by this.",
      ),
    },
  }
}
