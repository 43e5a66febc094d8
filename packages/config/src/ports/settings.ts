/**
 * Validated process settings with the source each value came from.
 *
 * @example
 * ```ts
 * const settings = await loadSettings({
 *   schema: z.object({
 *     DATA_DIR: z.string().default("./data"),
 *     LOG_LEVEL: z.enum(logLevelNames).default("info"),
 *   }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * settings.value.DATA_DIR     // "./data"
 * settings.explain("DATA_DIR") // "default"
 * ```
 */
export interface Settings<T extends Record<string, unknown>> {
  readonly value: Readonly<T>

  /** Name of the source that supplied `key`, or "default" for schema defaults. */
  explain<K extends keyof T & string>(key: K): string

  /** Sources that supplied at least one value, in the order they were applied. */
  sourcesUsed(): string[]
}
