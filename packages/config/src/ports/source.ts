/**
 * A flat source of process settings (environment, .env files).
 *
 * Sources only load raw strings; `loadSettings` merges them in order and
 * validates the result. An `undefined` value means "not provided".
 */
export interface ConfigSource {
  /** Shown by `Settings.explain`, e.g. "env" or "dotenv:.env.production". */
  readonly name: string

  load(): Promise<Record<string, string | undefined>>
}
