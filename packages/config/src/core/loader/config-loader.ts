import type { Logger } from "@tally/logger"
import type { ServiceRegistry } from "@tally/registry"
import { MemorySingleflight } from "@tally/singleflight"

import type { ConfigModule, ConfigPass } from "../../ports/config-module"
import type { DocumentStore } from "../../ports/document-store"
import { ConfigDocument } from "../document/config-document"
import {
  ConfigException,
  ConfigLoadError,
  RegistrationError,
  TypeMismatchError,
} from "../errors"
import { Parser } from "../parser/parser"
import { describeValue } from "../utils/config-value"
import { parseYamlDocument, stringifyYamlDocument } from "../yaml/yaml-codec"

export const DEFAULT_CONFIG_FILE = "config.yml"

export type LoadedConfigs = ReadonlyMap<ConfigModule, unknown>

export type LoadState =
  | { status: "idle" }
  | { status: "loading" }
  | { status: "loaded"; configs: LoadedConfigs }
  | { status: "failed"; error: ConfigLoadError }

export interface ConfigLoaderOptions {
  /** Every module the document holds. Fixed for the loader's lifetime. */
  modules: readonly ConfigModule[]
  store: DocumentStore
  registry: ServiceRegistry
  logger: Logger

  /** @default "config.yml" */
  file?: string

  /** Text written under the root `#` key of a generated document. */
  header?: string
}

interface PassResult {
  document: ConfigDocument
  configs: LoadedConfigs
}

const LOAD_KEY = "load"

/**
 * Parses every registered module from one document, once per process.
 *
 * The first `loadConfig` call drives the pass; calls made while it runs join
 * it and resume in call order once it commits. A `ConfigException` from any
 * module (or an unreadable document) archives the stored file to the first
 * free `<file>.old[.n]` and re-parses every module against a blank document.
 * The document is written back whenever the pass generated or repaired it.
 */
export class ConfigLoader {
  private readonly modules: readonly ConfigModule[]
  private readonly store: DocumentStore
  private readonly registry: ServiceRegistry
  private readonly logger: Logger
  private readonly file: string
  private readonly header: string | undefined
  private readonly flight = new MemorySingleflight<LoadedConfigs>()
  private state: LoadState = { status: "idle" }

  constructor(options: ConfigLoaderOptions) {
    this.modules = [...new Set(options.modules)]
    this.store = options.store
    this.registry = options.registry
    this.logger = options.logger
    this.file = options.file ?? DEFAULT_CONFIG_FILE
    this.header = options.header
  }

  get status(): LoadState["status"] {
    return this.state.status
  }

  async loadConfig<T>(module: ConfigModule<T>): Promise<T> {
    if (!this.modules.includes(module)) {
      throw new RegistrationError(`${module.name} is not a registered config module`, {
        context: { module: module.name, registered: this.modules.map((m) => m.name) },
      })
    }

    const configs = await this.loadAll()

    return expectInstance(module, configs.get(module))
  }

  /** Drives or joins the load pass and returns every module's config. */
  async loadAll(): Promise<LoadedConfigs> {
    if (this.state.status === "loaded") return this.state.configs
    if (this.state.status === "failed") throw this.state.error

    if (this.flight.has(LOAD_KEY)) {
      this.logger.debug("Waiting for the config load in progress")
    }

    const { value } = await this.flight.run(LOAD_KEY, () => this.runPass())

    return value
  }

  /** The committed configs, or `null` before the pass has committed. */
  getLoaded(): LoadedConfigs | null {
    return this.state.status === "loaded" ? this.state.configs : null
  }

  private async runPass(): Promise<LoadedConfigs> {
    this.state = { status: "loading" }
    this.logger.debug("Loading config modules", {
      modules: this.modules.map((m) => m.name),
    })

    try {
      const { document, configs } = await this.parseStored().catch((err: unknown) =>
        this.regenerate(err),
      )

      for (const repair of document.getRepairs()) {
        this.logger.warn(repair.message, { path: repair.path })
      }

      if (document.failSafe || document.repaired) {
        await this.store.write(this.file, stringifyYamlDocument(document.root))
        this.logger.info(`Saved ${this.file}`, { repairs: document.getRepairs().length })
      }

      this.state = { status: "loaded", configs }

      return configs
    } catch (err) {
      const error =
        err instanceof ConfigLoadError
          ? err
          : new ConfigLoadError(`Loading ${this.file} failed`, {
              cause: err,
              context: { file: this.file },
            })

      this.state = { status: "failed", error }
      this.logger.fatal(error.message, { err: error })

      throw error
    }
  }

  private async parseStored(): Promise<PassResult> {
    const text = await this.store.read(this.file)
    const root = text === null ? null : parseYamlDocument(text, this.file)
    const document = root ? ConfigDocument.loaded(root) : ConfigDocument.failSafe(this.header)

    return { document, configs: await this.parseAll(document) }
  }

  private async regenerate(err: unknown): Promise<PassResult> {
    if (!(err instanceof ConfigException)) throw err

    this.logger.error(`Error loading ${this.file}: ${err.message}`, { err, pass: "initial" })

    if (await this.store.exists(this.file)) {
      const backup = await this.nextBackupName()

      await this.store.copy(this.file, backup)
      this.logger.warn(`Regenerating ${this.file}. The old file is saved to ${backup}.`, {
        backup,
      })
    } else {
      this.logger.warn(`Regenerating ${this.file}`)
    }

    const document = ConfigDocument.failSafe(this.header)

    try {
      return { document, configs: await this.parseAll(document) }
    } catch (cause) {
      throw new ConfigLoadError(`Regenerating ${this.file} failed`, {
        cause,
        context: { file: this.file, pass: "regenerated" },
      })
    }
  }

  private async nextBackupName(): Promise<string> {
    let name = `${this.file}.old`

    for (let n = 2; await this.store.exists(name); n++) {
      name = `${this.file}.old.${n}`
    }

    return name
  }

  private async parseAll(document: ConfigDocument): Promise<LoadedConfigs> {
    const parser = Parser.over(document)
    const tasks = new Map<ConfigModule, Promise<unknown>>()
    const pass: ConfigPass = {
      failSafe: document.failSafe,
      require: async <T>(module: ConfigModule<T>): Promise<T> => {
        const task = tasks.get(module)

        if (!task) {
          throw new RegistrationError(`${module.name} is not a registered config module`, {
            context: { module: module.name },
          })
        }

        return expectInstance(module, await task)
      },
    }

    for (const module of this.modules) {
      tasks.set(
        module,
        Promise.resolve().then(() => module.parse(parser, this.registry, pass)),
      )
    }

    const entries = await Promise.all(
      [...tasks].map(async ([module, task]) => [module, await task] as const),
    )

    return new Map(entries)
  }
}

function expectInstance<T>(module: ConfigModule<T>, value: unknown): T {
  if (!(value instanceof module)) {
    throw new TypeMismatchError(`${module.name}.parse() returned ${describeValue(value)}`, {
      context: { module: module.name },
    })
  }

  return value
}
