import type { LabelSet } from "@tally/schema"

import type { AccountTarget } from "./account-target"
import type { Messages } from "./messages"

export type CommandMethodInit = {
  command: string
  permission: string
  defaultOpOnly: boolean
  src: AccountTarget
  dest: AccountTarget
  rate: number
  minimumAmount: number
  maximumAmount: number
  transactionLabels: LabelSet
  messages: Messages
}

/** A command that moves money from `src` to `dest`. */
export class CommandMethod {
  readonly command: string
  readonly permission: string
  readonly defaultOpOnly: boolean
  readonly src: AccountTarget
  readonly dest: AccountTarget
  readonly rate: number
  readonly minimumAmount: number
  readonly maximumAmount: number
  readonly transactionLabels: LabelSet
  readonly messages: Messages

  constructor(init: CommandMethodInit) {
    this.command = init.command
    this.permission = init.permission
    this.defaultOpOnly = init.defaultOpOnly
    this.src = init.src
    this.dest = init.dest
    this.rate = init.rate
    this.minimumAmount = init.minimumAmount
    this.maximumAmount = init.maximumAmount
    this.transactionLabels = init.transactionLabels
    this.messages = init.messages
  }

  accepts(amount: number): boolean {
    return amount >= this.minimumAmount && amount <= this.maximumAmount
  }

  /** What the destination receives for `amount` taken from the source, rounded down. */
  received(amount: number): number {
    return Math.floor(amount * this.rate)
  }
}
