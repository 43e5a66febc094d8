import { ConfigDocument, Parser } from "@tally/config"
import { basicSchemaKind } from "@tally/schema"

import { AccountTarget } from "../account-target"
import { CommandMethod } from "../command-method"
import { DEFAULT_MESSAGES, Messages } from "../messages"

const basic = basicSchemaKind.build(Parser.over(ConfigDocument.failSafe()))

function methodWith(rate: number): CommandMethod {
  return new CommandMethod({
    command: "exchange",
    permission: "tally.transfer.exchange",
    defaultOpOnly: false,
    src: new AccountTarget("sender", basic),
    dest: new AccountTarget("recipient", basic),
    rate,
    minimumAmount: 5,
    maximumAmount: 100,
    transactionLabels: {},
    messages: new Messages(DEFAULT_MESSAGES),
  })
}

describe("CommandMethod", () => {
  it.each([
    { amount: 4, accepted: false },
    { amount: 5, accepted: true },
    { amount: 100, accepted: true },
    { amount: 101, accepted: false },
  ])("accepts $amount: $accepted", ({ amount, accepted }) => {
    expect(methodWith(1).accepts(amount)).toBe(accepted)
  })

  it("applies the rate and rounds down", () => {
    expect(methodWith(0.5).received(15)).toBe(7)
    expect(methodWith(2).received(15)).toBe(30)
  })
})
