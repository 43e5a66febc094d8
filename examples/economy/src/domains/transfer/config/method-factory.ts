import type { Parser } from "@tally/config"
import type { LabelSet, Schema } from "@tally/schema"

import { AccountTarget, type TargetKind } from "../model/account-target"
import { CommandMethod } from "../model/command-method"
import { type MessageTemplates, Messages } from "../model/messages"
import { parseLabelSet } from "./label-set"

export const FALLBACK_COMMAND = "transfer-command"
export const FALLBACK_PERMISSION = "tally.transfer.unspecified"

/** Values a method starts from before its section is read. */
export type CommandDefaults = {
  command: string
  permission: string
  defaultOpOnly: boolean
  src: TargetKind
  dest: TargetKind
  rate: number
  minimumAmount: number
  maximumAmount: number
  transactionLabels: LabelSet
  messages?: MessageTemplates
}

const BASE_DEFAULTS: CommandDefaults = {
  command: FALLBACK_COMMAND,
  permission: FALLBACK_PERMISSION,
  defaultOpOnly: true,
  src: "sender",
  dest: "recipient",
  rate: 1,
  minimumAmount: 0,
  maximumAmount: 10_000,
  transactionLabels: {},
}

export function buildCommand(
  parser: Parser,
  schema: Schema,
  defaults: CommandDefaults = BASE_DEFAULTS,
): CommandMethod {
  const command = expectName(parser, {
    key: "command",
    label: "name",
    fallback: defaults.command,
    empty: FALLBACK_COMMAND,
    doc: "The name of the command players run.",
  })
  const permission = expectName(parser, {
    key: "permission",
    label: "permission",
    fallback: defaults.permission,
    empty: FALLBACK_PERMISSION,
    doc: "The permission needed to run the command.\nIt is created if it does not exist.",
  })
  const defaultOpOnly = parser.expectBool(
    "default-op",
    defaults.defaultOpOnly,
    "Whether only operators may run the command unless the permission is granted.",
  )

  const src = AccountTarget.parse(
    parser.enter("src", "The account money is taken from."),
    schema,
    defaults.src,
  )
  const dest = AccountTarget.parse(
    parser.enter("dest", "The account money is given to."),
    schema,
    defaults.dest,
  )

  const rate = parser.expectNumber(
    "rate",
    defaults.rate,
    `How much of the sent money arrives.
With the "currency" schema, this converts between currencies.`,
  )
  const minimumAmount = parser.expectInt(
    "minimum-amount",
    defaults.minimumAmount,
    "The smallest amount that can be sent at once.",
  )
  let maximumAmount = parser.expectInt(
    "maximum-amount",
    defaults.maximumAmount,
    "The largest amount that can be sent at once.",
  )

  if (maximumAmount < minimumAmount) {
    maximumAmount = parser.setValue(
      "maximum-amount",
      minimumAmount,
      "maximum-amount must not be lower than minimum-amount.",
    )
  }

  const transactionLabels = parseLabelSet(
    parser.enter(
      "transaction-labels",
      "Labels added to every transaction of this command.\nUse them to tell how players earn and spend money.",
    ),
    defaults.transactionLabels,
  )
  const messages = Messages.parse(parser.enter("messages", ""), defaults.messages)

  return new CommandMethod({
    command,
    permission,
    defaultOpOnly,
    src,
    dest,
    rate,
    minimumAmount,
    maximumAmount,
    transactionLabels,
    messages,
  })
}

type NameKey = {
  key: string
  label: string
  fallback: string

  /** Used when the value is empty, or when nothing is left before the first space. */
  empty: string
  doc: string
}

function expectName(parser: Parser, { key, label, fallback, empty, doc }: NameKey): string {
  const value = parser.expectString(key, fallback, doc)

  if (value === "") {
    return parser.setValue(key, empty, `The command's ${label} (key "${key}") must not be empty.`)
  }

  const space = value.indexOf(" ")

  if (space === -1) return value

  const head = value.slice(0, space)

  return parser.setValue(
    key,
    head === "" ? empty : head,
    `The command's ${label} (key "${key}") must not have spaces.`,
  )
}
