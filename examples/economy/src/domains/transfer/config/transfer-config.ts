import type { ConfigPass, Parser } from "@tally/config"
import type { ServiceRegistry } from "@tally/registry"
import { SchemaConfig } from "@tally/schema"

import type { CommandMethod } from "../model/command-method"
import { DEFAULT_METHODS } from "./default-methods"
import { buildCommand } from "./method-factory"

/** The `transfer` section: commands that move money between accounts. */
export class TransferConfig {
  constructor(readonly methods: readonly CommandMethod[]) {}

  static async parse(
    parser: Parser,
    _registry: ServiceRegistry,
    pass: ConfigPass,
  ): Promise<TransferConfig> {
    const { schema } = await pass.require(SchemaConfig)
    const section = parser.enter("transfer", "Commands that move money between accounts.")
    const methods = section.enter(
      "methods",
      "Each key is one transfer command. Remove a key to disable that command.",
    )
    const names = methods.getKeys()

    if (names.length === 0) {
      return new TransferConfig(
        [...DEFAULT_METHODS].map(([name, defaults]) =>
          buildCommand(methods.enter(name, ""), schema, defaults),
        ),
      )
    }

    return new TransferConfig(
      names.map((name) => buildCommand(methods.enter(name, ""), schema, DEFAULT_METHODS.get(name))),
    )
  }

  findByCommand(command: string): CommandMethod | undefined {
    return this.methods.find((method) => method.command === command)
  }
}
