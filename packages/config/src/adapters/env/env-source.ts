import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Only variables starting with `prefix` are read, with the prefix removed. */
  prefix?: string

  /** @default process.env */
  env?: Record<string, string | undefined>
}

/**
 * Reads the process environment. Empty variables (`LOG_LEVEL=`) count as unset,
 * so they never shadow an earlier source or a schema default.
 */
export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, string | undefined>> {
    const values: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (value === undefined || value === "" || !key.startsWith(this.prefix)) continue

      values[key.slice(this.prefix.length)] = value
    }

    return values
  }
}
