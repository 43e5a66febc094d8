import type { Parser } from "@tally/config"

export const MESSAGE_KEYS = [
  "player-only-command",
  "notify-sender-success",
  "notify-recipient-success",
  "no-source-account",
  "no-destination-account",
  "underflow",
  "overflow",
  "internal-error",
] as const

export type MessageKey = (typeof MESSAGE_KEYS)[number]

export type MessageTemplates = Readonly<Record<MessageKey, string>>

export type MessageVars = Readonly<Record<string, string | number>>

export const DEFAULT_MESSAGES: MessageTemplates = {
  "player-only-command": "Only players can use this command.",
  "notify-sender-success": "You have sent {sentAmount} to {recipient}. They received {receivedAmount}.",
  "notify-recipient-success": "You have received {receivedAmount} from {sender}.",
  "no-source-account": "There is no account to send money from.",
  "no-destination-account": "{recipient} has no account to receive money.",
  underflow: "There is not enough money to send {sentAmount}.",
  overflow: "{recipient} cannot hold {receivedAmount} more.",
  "internal-error": "An internal error occurred. Please try again.",
}

const MESSAGE_DOCS: Readonly<Record<MessageKey, string>> = {
  "player-only-command": "Sent when the console runs a command that takes money from the sender.",
  "notify-sender-success": "Sent to the sender after a transfer.",
  "notify-recipient-success": "Sent to the recipient after a transfer.",
  "no-source-account": "Sent when the source account does not exist.",
  "no-destination-account": "Sent when the destination account does not exist.",
  underflow: "Sent when the source account would drop below its minimum.",
  overflow: "Sent when the destination account would exceed its maximum.",
  "internal-error": "Sent when the transfer fails for any other reason.",
}

const PLACEHOLDER = /\{(\w+)\}/g

/** Chat messages of one transfer command. `{name}` placeholders are filled by {@link Messages.format}. */
export class Messages {
  constructor(readonly templates: MessageTemplates) {}

  static parse(parser: Parser, defaults: MessageTemplates = DEFAULT_MESSAGES): Messages {
    const templates: Record<string, string> = {}

    for (const key of MESSAGE_KEYS) {
      templates[key] = parser.expectString(key, defaults[key], MESSAGE_DOCS[key])
    }

    return new Messages({ ...defaults, ...templates })
  }

  /** Unknown placeholders are left as written. */
  format(key: MessageKey, vars: MessageVars = {}): string {
    return this.templates[key].replace(PLACEHOLDER, (match, name: string) => {
      const value = vars[name]

      return value === undefined ? match : String(value)
    })
  }
}
