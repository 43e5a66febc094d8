import type { LogLevelName } from "./log-level"

/**
 * Policy shared by every adapter: which levels are emitted and whether
 * output is rendered for humans.
 */
export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /** Human-readable output for local runs; structured JSON otherwise. */
  prettify?: boolean
}
