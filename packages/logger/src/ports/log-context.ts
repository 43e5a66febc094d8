export type LogContext = {
  service: string
  env: string

  /** Feature module the entry belongs to (e.g. "config", "transfer") */
  module: string

  /** Document file a config entry refers to */
  configFile: string

  /** Load pass an entry belongs to: "initial" or "regenerated" */
  pass: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Fields added (or overridden) by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
