import type { Parser } from "@tally/config"
import type { LabelSet } from "@tally/schema"

/**
 * Reads every key of the section as a label. An empty section is filled with
 * `defaults`.
 */
export function parseLabelSet(parser: Parser, defaults: LabelSet = {}): LabelSet {
  const names = parser.getKeys()
  const entries: Record<string, string> = {}

  if (names.length === 0) {
    for (const [name, value] of Object.entries(defaults)) {
      entries[name] = parser.expectString(name, value, "")
    }

    return entries
  }

  for (const name of names) {
    entries[name] = parser.expectString(name, "", "")
  }

  return entries
}
