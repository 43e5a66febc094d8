import type { CommandDefaults } from "./method-factory"

export const TRANSFER_METHOD_LABEL = "tally/transfer-method"

/** Written when `transfer.methods` is empty. */
export const DEFAULT_METHODS: ReadonlyMap<string, CommandDefaults> = new Map<string, CommandDefaults>([
  [
    "pay",
    {
      command: "pay",
      permission: "tally.transfer.pay",
      defaultOpOnly: false,
      src: "sender",
      dest: "recipient",
      rate: 1,
      minimumAmount: 1,
      maximumAmount: 10_000,
      transactionLabels: { [TRANSFER_METHOD_LABEL]: "pay" },
    },
  ],
  [
    "add-money",
    {
      command: "addmoney",
      permission: "tally.transfer.add-money",
      defaultOpOnly: true,
      src: "system",
      dest: "recipient",
      rate: 1,
      minimumAmount: 1,
      maximumAmount: 1_000_000,
      transactionLabels: { [TRANSFER_METHOD_LABEL]: "add-money" },
    },
  ],
  [
    "take-money",
    {
      command: "takemoney",
      permission: "tally.transfer.take-money",
      defaultOpOnly: true,
      src: "recipient",
      dest: "system",
      rate: 1,
      minimumAmount: 1,
      maximumAmount: 1_000_000,
      transactionLabels: { [TRANSFER_METHOD_LABEL]: "take-money" },
    },
  ],
])
