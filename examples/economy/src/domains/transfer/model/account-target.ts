import type { Parser } from "@tally/config"
import {
  type AccountOwner,
  AccountLabels,
  InvalidConfigError,
  type LabelSelector,
  OracleNames,
  type Schema,
} from "@tally/schema"

export type TargetKind = "system" | "sender" | "recipient"

/** Whoever ran the command. The console owns no accounts. */
export type TransferSender = { kind: "player"; owner: AccountOwner } | { kind: "console" }

const TARGET_DOC = `Can be "system", "sender" or "recipient".
If "sender" is used, only players can run this command (not the console).`

function isTargetKind(value: string): value is TargetKind {
  return value === "system" || value === "sender" || value === "recipient"
}

/** One side of a transfer: the system oracle, the sender or the recipient. */
export class AccountTarget {
  constructor(
    readonly target: TargetKind,
    readonly schema: Schema,
  ) {}

  /**
   * Reads `of` from the target's section. The schema is cloned with the same
   * section, so a target may override schema keys such as `currency`.
   */
  static parse(parser: Parser, schema: Schema, fallback: TargetKind = "system"): AccountTarget {
    const specific = cloneSchema(parser, schema)
    const of = parser.expectString("of", fallback, TARGET_DOC)
    const target = isTargetKind(of)
      ? of
      : parser.failSafe(fallback, 'Expected key "of" to be "system", "sender" or "recipient".')

    return new AccountTarget(target, specific)
  }

  /** `null` when the target names the sender and the sender is not a player. */
  getSelector(sender: TransferSender, recipient: AccountOwner): LabelSelector | null {
    switch (this.target) {
      case "system":
        return { entries: { [AccountLabels.ORACLE]: OracleNames.TRANSFER } }
      case "sender":
        return sender.kind === "player" ? this.schema.getSelector(sender.owner) : null
      case "recipient":
        return this.schema.getSelector(recipient)
    }
  }
}

function cloneSchema(parser: Parser, schema: Schema): Schema {
  try {
    return schema.cloneWithConfig(parser)
  } catch (err) {
    if (!(err instanceof InvalidConfigError)) throw err

    return parser.failSafe(schema.cloneWithConfig(null), `${err.message}. Using the global schema.`)
  }
}
