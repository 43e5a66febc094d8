import type { LabelSet } from "./labels"

/** How balances are imported from another economy on first use. */
export interface MigrationSetup {
  readonly enabled: boolean

  /** Name of the economy to import from. */
  readonly source: string

  /** Imported balances are multiplied by this. */
  readonly multiplier: number
  readonly labels: LabelSet
}

/** How a missing account is created. */
export interface InitialSetup {
  readonly initialValue: number
  readonly labels: LabelSet
}
