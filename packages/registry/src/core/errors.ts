import { BaseError, type ErrorContext } from "@tally/errors"

export class DependencyError extends BaseError<"registry_dependency"> {
  constructor(message: string, options?: { context?: ErrorContext; cause?: unknown }) {
    super(message, { code: "registry_dependency", ...options })
  }
}
