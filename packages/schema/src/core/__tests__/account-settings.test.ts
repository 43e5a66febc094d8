import { ConfigDocument, type ConfigMap, Parser } from "@tally/config"
import { parseAccountSettings } from "../account-settings"

function parserOver(root: ConfigMap): Parser {
  return Parser.over(ConfigDocument.loaded(root))
}

describe("parseAccountSettings", () => {
  it("defaults every value", () => {
    expect(parseAccountSettings(parserOver({}))).toEqual({
      initialBalance: 100,
      minimumBalance: 0,
      maximumBalance: 1_000_000,
      migration: { enabled: true, source: "legacy", multiplier: 1 },
    })
  })

  it("raises a maximum below the minimum", () => {
    const parser = parserOver({ "minimum-balance": 50, "maximum-balance": 10 })

    const settings = parseAccountSettings(parser)

    expect(settings.maximumBalance).toBe(50)
    expect(settings.initialBalance).toBe(50)
    expect(parser.getRepairs()).toContainEqual({
      path: "maximum-balance",
      message: "maximum-balance must not be lower than minimum-balance.",
    })
  })

  it("clamps the initial balance into range", () => {
    const parser = parserOver({ "minimum-balance": 0, "maximum-balance": 500, "initial-balance": 900 })

    expect(parseAccountSettings(parser).initialBalance).toBe(500)
    expect(parser.getFullConfig()).toMatchObject({ "initial-balance": 500 })
  })
})
