/** Label name → value pairs attached to an account or a transaction. */
export type LabelSet = Readonly<Record<string, string>>

/**
 * Matches accounts whose labels contain every entry. An empty value matches
 * any value, as long as the label is present.
 */
export interface LabelSelector {
  readonly entries: LabelSet
}

export const AccountLabels = {
  OWNER_ID: "tally/owner-id",
  OWNER_NAME: "tally/owner-name",
  CURRENCY: "tally/currency",
  VALUE_MAIN: "tally/value-main",
  VALUE_MIN: "tally/value-min",
  VALUE_MAX: "tally/value-max",
  MIGRATION_SOURCE: "tally/migration-source",
  ORACLE: "tally/oracle",
} as const

export const OracleNames = {
  TRANSFER: "transfer",
} as const
