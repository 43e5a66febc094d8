import type { ServiceRegistry } from "@tally/registry"

import type { Parser } from "../core/parser/parser"

/**
 * Handle a module's `parse` gets for the pass it runs in.
 */
export interface ConfigPass {
  /** `true` while the document is being generated from scratch. */
  readonly failSafe: boolean

  /**
   * Waits for another module's result from this same pass.
   *
   * Modules must not require each other in a cycle: the pass would never settle.
   */
  require<T>(module: ConfigModule<T>): Promise<T>
}

/**
 * A config module is a class whose static `parse` builds its instance from
 * the shared document. The class itself is the module's identity.
 *
 * @example
 * ```ts
 * class GreetingConfig {
 *   constructor(readonly text: string) {}
 *
 *   static parse(parser: Parser): GreetingConfig {
 *     const section = parser.enter("greeting", "Message shown on join.")
 *
 *     return new GreetingConfig(section.expectString("text", "Welcome!", "The message."))
 *   }
 * }
 * ```
 */
export interface ConfigModule<T = unknown> {
  new (...args: never[]): T

  readonly name: string

  /**
   * Reads this module's section. Throws `ConfigException` for problems that
   * need the document regenerated; anything else should be repaired through
   * the parser.
   */
  parse(parser: Parser, registry: ServiceRegistry, pass: ConfigPass): T | Promise<T>
}
