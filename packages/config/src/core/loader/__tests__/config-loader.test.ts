import type { Logger } from "@tally/logger"
import { createToken, ServiceRegistry } from "@tally/registry"
import type { MockProxy } from "vitest-mock-extended"
import { mock } from "vitest-mock-extended"

import { MemoryDocumentStore } from "../../../adapters/memory/memory-document-store"
import type { ConfigModule, ConfigPass } from "../../../ports/config-module"
import {
  ConfigException,
  ConfigLoadError,
  RegistrationError,
  TypeMismatchError,
} from "../../errors"
import type { Parser } from "../../parser/parser"
import { parseYamlDocument } from "../../yaml/yaml-codec"
import { ConfigLoader } from "../config-loader"

class GreetingConfig {
  constructor(readonly text: string) {}

  static parse(parser: Parser): GreetingConfig {
    const section = parser.enter("greeting", "Join message.")

    return new GreetingConfig(section.expectString("text", "Welcome!", "Shown on join."))
  }
}

class LimitConfig {
  constructor(readonly max: number) {}

  static async parse(parser: Parser): Promise<LimitConfig> {
    const max = parser.enter("limits", "").expectInt("max", 100, "")

    if (max < 0) {
      throw new ConfigException("limits.max must not be negative")
    }

    return new LimitConfig(max)
  }
}

class RateConfig {
  constructor(
    readonly rate: number,
    readonly max: number,
  ) {}

  static async parse(parser: Parser, _registry: ServiceRegistry, pass: ConfigPass) {
    const limits = await pass.require(LimitConfig)

    return new RateConfig(parser.enter("rates", "").expectNumber("rate", 1, ""), limits.max)
  }
}

class UnregisteredConfig {
  static parse(): UnregisteredConfig {
    return new UnregisteredConfig()
  }
}

const STORED = "greeting:\n  text: Hi\nlimits:\n  max: 5\n"

describe("ConfigLoader", () => {
  let store: MemoryDocumentStore
  let logger: MockProxy<Logger>

  function createLoader(modules: readonly ConfigModule[] = [GreetingConfig, LimitConfig]) {
    return new ConfigLoader({
      modules,
      store,
      logger,
      registry: new ServiceRegistry(),
      header: "Main config.",
    })
  }

  beforeEach(() => {
    store = new MemoryDocumentStore({ "config.yml": STORED })
    logger = mock<Logger>()
  })

  describe("single pass", () => {
    it("runs one pass for concurrent callers", async () => {
      const parseGreeting = vi.spyOn(GreetingConfig, "parse")
      const parseLimit = vi.spyOn(LimitConfig, "parse")
      const loader = createLoader()

      const [greeting, limit, again, all] = await Promise.all([
        loader.loadConfig(GreetingConfig),
        loader.loadConfig(LimitConfig),
        loader.loadConfig(GreetingConfig),
        loader.loadAll(),
      ])

      expect(parseGreeting).toHaveBeenCalledTimes(1)
      expect(parseLimit).toHaveBeenCalledTimes(1)
      expect(greeting.text).toBe("Hi")
      expect(limit.max).toBe(5)
      expect(again).toBe(greeting)
      expect(all.get(LimitConfig)).toBe(limit)
    })

    it("answers later calls from the committed configs", async () => {
      const parseGreeting = vi.spyOn(GreetingConfig, "parse")
      const loader = createLoader()

      const first = await loader.loadConfig(GreetingConfig)
      const second = await loader.loadConfig(GreetingConfig)

      expect(second).toBe(first)
      expect(parseGreeting).toHaveBeenCalledTimes(1)
      expect(loader.status).toBe("loaded")
    })

    it("loads modules nobody asked for", async () => {
      const loader = createLoader()

      expect(loader.getLoaded()).toBeNull()

      await loader.loadConfig(GreetingConfig)

      expect(loader.getLoaded()?.get(LimitConfig)).toBeInstanceOf(LimitConfig)
    })

    it("resumes joined callers in call order", async () => {
      const loader = createLoader()
      const order: string[] = []

      await Promise.all(
        ["a", "b", "c"].map((label) =>
          loader.loadConfig(GreetingConfig).then(() => {
            order.push(label)
          }),
        ),
      )

      expect(order.filter((label) => label !== "a")).toEqual(["b", "c"])
      expect(logger.debug).toHaveBeenCalledWith("Waiting for the config load in progress")
    })

    it("does not write a document that needed no repair", async () => {
      await createLoader().loadAll()

      expect(await store.read("config.yml")).toBe(STORED)
      expect(store.names()).toEqual(["config.yml"])
    })
  })

  describe("generation", () => {
    it("generates a missing document", async () => {
      store = new MemoryDocumentStore()

      const greeting = await createLoader().loadConfig(GreetingConfig)
      const written = await store.read("config.yml")

      expect(greeting.text).toBe("Welcome!")
      expect(parseYamlDocument(written ?? "", "config.yml")).toEqual({
        "#": "Main config.",
        "#greeting": "Join message.",
        greeting: { "#text": "Shown on join.", text: "Welcome!" },
        limits: { max: 100 },
      })
      expect(store.names()).toEqual(["config.yml"])
    })

    it("treats a blank file as missing", async () => {
      store = new MemoryDocumentStore({ "config.yml": "  \n" })

      const limit = await createLoader().loadConfig(LimitConfig)

      expect(limit.max).toBe(100)
      expect(parseYamlDocument((await store.read("config.yml")) ?? "", "config.yml")).toMatchObject(
        { "#": "Main config.", limits: { max: 100 } },
      )
    })
  })

  describe("repair", () => {
    it("keeps valid values, replaces malformed ones and saves the result", async () => {
      store = new MemoryDocumentStore({ "config.yml": "greeting:\n  text: Hi\nlimits:\n  max: lots\n" })

      const loader = createLoader()
      const limit = await loader.loadConfig(LimitConfig)
      const saved = parseYamlDocument((await store.read("config.yml")) ?? "", "config.yml")

      expect(limit.max).toBe(100)
      expect(saved).toEqual({
        "#greeting": "Join message.",
        greeting: { text: "Hi" },
        limits: { max: 100 },
      })
      expect(store.names()).toEqual(["config.yml"])
      expect(logger.warn).toHaveBeenCalledWith('Expected an integer at "max", got "lots"', {
        path: "limits.max",
      })
    })
  })

  describe("regeneration", () => {
    const BROKEN = "greeting:\n  text: Hi\nlimits:\n  max: -5\n"

    it("archives the document to the first free backup name and regenerates it", async () => {
      store = new MemoryDocumentStore({
        "config.yml": BROKEN,
        "config.yml.old": "first: backup\n",
        "config.yml.old.2": "second: backup\n",
      })

      const loader = createLoader()
      const [limit, greeting] = await Promise.all([
        loader.loadConfig(LimitConfig),
        loader.loadConfig(GreetingConfig),
      ])

      expect(limit.max).toBe(100)
      expect(greeting.text).toBe("Welcome!")
      expect(store.names()).toEqual([
        "config.yml",
        "config.yml.old",
        "config.yml.old.2",
        "config.yml.old.3",
      ])
      expect(await store.read("config.yml.old.3")).toBe(BROKEN)
      expect(await store.read("config.yml.old")).toBe("first: backup\n")
      expect(
        parseYamlDocument((await store.read("config.yml")) ?? "", "config.yml"),
      ).toMatchObject({ "#": "Main config.", greeting: { text: "Welcome!" }, limits: { max: 100 } })
    })

    it("logs the failure and the backup", async () => {
      store = new MemoryDocumentStore({ "config.yml": BROKEN })

      await createLoader().loadAll()

      expect(logger.error).toHaveBeenCalledWith(
        "Error loading config.yml: limits.max must not be negative",
        expect.objectContaining({ pass: "initial" }),
      )
      expect(logger.warn).toHaveBeenCalledWith(
        "Regenerating config.yml. The old file is saved to config.yml.old.",
        { backup: "config.yml.old" },
      )
    })

    it("regenerates a document that is not valid YAML", async () => {
      store = new MemoryDocumentStore({ "config.yml": "greeting: [unclosed\n" })

      const greeting = await createLoader().loadConfig(GreetingConfig)

      expect(greeting.text).toBe("Welcome!")
      expect(await store.read("config.yml.old")).toBe("greeting: [unclosed\n")
    })

    it("regenerates a document whose root is not a map", async () => {
      store = new MemoryDocumentStore({ "config.yml": "- greeting\n- limits\n" })

      const limit = await createLoader().loadConfig(LimitConfig)

      expect(limit.max).toBe(100)
      expect(await store.exists("config.yml.old")).toBe(true)
    })

    it("fails for good when the regenerated document fails too", async () => {
      class BrokenConfig {
        static parse(): BrokenConfig {
          throw new ConfigException("always broken")
        }
      }
      const parse = vi.spyOn(BrokenConfig, "parse")
      const loader = createLoader([GreetingConfig, BrokenConfig])

      const error = await loader.loadConfig(GreetingConfig).catch((e: unknown) => e)
      const again = await loader.loadConfig(GreetingConfig).catch((e: unknown) => e)

      expect(error).toBeInstanceOf(ConfigLoadError)
      expect(error).toMatchObject({
        code: "config_load_failed",
        message: "Regenerating config.yml failed",
        isOperational: false,
        cause: expect.any(ConfigException),
      })
      expect(again).toBe(error)
      expect(parse).toHaveBeenCalledTimes(2)
      expect(loader.status).toBe("failed")
      expect(logger.fatal).toHaveBeenCalledWith("Regenerating config.yml failed", { err: error })
    })

    it("does not regenerate for errors other than ConfigException", async () => {
      class CrashingConfig {
        static parse(): CrashingConfig {
          throw new TypeError("boom")
        }
      }
      const loader = createLoader([GreetingConfig, CrashingConfig])

      const error = await loader.loadAll().catch((e: unknown) => e)

      expect(error).toBeInstanceOf(ConfigLoadError)
      expect(error).toMatchObject({
        message: "Loading config.yml failed",
        cause: expect.any(TypeError),
      })
      expect(store.names()).toEqual(["config.yml"])
    })
  })

  describe("module table", () => {
    it("rejects a module outside the table without starting a pass", async () => {
      const loader = createLoader()

      const error = await loader.loadConfig(UnregisteredConfig).catch((e: unknown) => e)

      expect(error).toBeInstanceOf(RegistrationError)
      expect(error).toMatchObject({
        code: "config_module_unregistered",
        message: "UnregisteredConfig is not a registered config module",
      })
      expect(loader.status).toBe("idle")
    })

    it("rejects a parse result that is not an instance of the module", async () => {
      class ShapedConfig {
        readonly size = 1

        static parse(): ShapedConfig {
          return { size: 1 }
        }
      }
      const loader = createLoader([ShapedConfig])

      const error = await loader.loadConfig(ShapedConfig).catch((e: unknown) => e)

      expect(error).toBeInstanceOf(TypeMismatchError)
      expect(error).toMatchObject({
        code: "config_type_mismatch",
        message: "ShapedConfig.parse() returned a map",
      })
    })
  })

  describe("parse context", () => {
    it("lets a module wait for another module of the same pass", async () => {
      const loader = createLoader([RateConfig, LimitConfig])

      const rate = await loader.loadConfig(RateConfig)

      expect(rate.max).toBe(5)
      expect(rate.rate).toBe(1)
    })

    it("fails the pass when a module requires one outside the table", async () => {
      const loader = createLoader([RateConfig])

      const error = await loader.loadAll().catch((e: unknown) => e)

      expect(error).toMatchObject({
        code: "config_load_failed",
        cause: expect.any(RegistrationError),
      })
    })

    it("hands every module the registry", async () => {
      const PrefixToken = createToken<string>("Prefix")

      class PrefixedConfig {
        constructor(readonly prefix: string) {}

        static async parse(_parser: Parser, registry: ServiceRegistry): Promise<PrefixedConfig> {
          return new PrefixedConfig(await registry.get(PrefixToken))
        }
      }

      const registry = new ServiceRegistry()
      registry.store(PrefixToken, "tally")
      const loader = new ConfigLoader({ modules: [PrefixedConfig], store, logger, registry })

      await expect(loader.loadConfig(PrefixedConfig)).resolves.toEqual(new PrefixedConfig("tally"))
    })
  })
})
