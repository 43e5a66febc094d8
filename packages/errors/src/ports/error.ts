/**
 * Machine-readable error code, snake_case by convention
 * (e.g. "config_invalid", "registry_dependency").
 */
export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error (module names, key paths, file names).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /** `true` if running the same operation again might succeed */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (a broken config file, a bad override),
   * `false` for programming errors (an unregistered module, a missing service).
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date
  readonly cause?: unknown
}

/**
 * JSON-safe error shape used by loggers.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
