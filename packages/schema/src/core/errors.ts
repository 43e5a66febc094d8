import { BaseError, type ErrorContext } from "@tally/errors"

type SchemaErrorOptions = Readonly<{
  context?: ErrorContext
  cause?: unknown
}>

/** Invalid overrides given to `cloneWithConfig`, or an invalid variable value. */
export class InvalidConfigError extends BaseError<"schema_invalid_config"> {
  constructor(message: string, options?: SchemaErrorOptions) {
    super(message, { code: "schema_invalid_config", ...options })
  }
}

export class VariableAlreadySuppliedError extends BaseError<"schema_variable_supplied"> {
  constructor(variable: string) {
    super(`Variable "${variable}" was already supplied`, {
      code: "schema_variable_supplied",
      context: { variable },
      isOperational: false,
    })
  }
}
