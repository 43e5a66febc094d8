/**
 * A value a schema needs at use time before it can answer queries
 * (e.g. which currency a command operates on).
 */
export interface Variable {
  readonly name: string

  /** Human-readable description of what the value is for. */
  readonly purpose: string

  /**
   * Supplies the value. Throws `InvalidConfigError` for an unacceptable value
   * (the variable stays required) and `VariableAlreadySuppliedError` when
   * called a second time.
   */
  supply(value: unknown): void
}
