import { BaseError, type ErrorContext, errorKind } from "@tally/errors"

type ConfigErrorOptions = Readonly<{
  context?: ErrorContext
  cause?: unknown
}>

/**
 * Thrown by a module's `parse` for a structural problem it cannot repair in
 * place. The loader answers it by archiving the document and regenerating it.
 */
export class ConfigException extends BaseError<"config_invalid"> {
  constructor(message: string, options?: ConfigErrorOptions) {
    super(message, { code: "config_invalid", ...options })
  }
}

/** Even the regenerated document could not be loaded. Fatal at startup. */
export class ConfigLoadError extends BaseError<"config_load_failed"> {
  constructor(message: string, options?: ConfigErrorOptions) {
    super(message, { code: "config_load_failed", isOperational: false, ...options })
  }
}

export class RegistrationError extends BaseError<"config_module_unregistered"> {
  constructor(message: string, options?: ConfigErrorOptions) {
    super(message, { code: "config_module_unregistered", isOperational: false, ...options })
  }
}

export class TypeMismatchError extends BaseError<"config_type_mismatch"> {
  constructor(message: string, options?: ConfigErrorOptions) {
    super(message, { code: "config_type_mismatch", isOperational: false, ...options })
  }
}

/** `copy` was asked for a document the store does not hold. */
export const DocumentNotFound = errorKind("document_not_found")

export const DocumentNameInvalid = errorKind("document_name_invalid", { isOperational: false })

export const SettingsInvalid = errorKind("settings_invalid", { isOperational: false })
