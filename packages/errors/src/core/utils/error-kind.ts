import type { ErrorCode } from "../../ports/error"
import { BaseError, type BaseErrorOptions } from "../base-error"

export type ErrorKindOptions = Omit<BaseErrorOptions, "code">

/** One error code, shared by the code that throws it and the code that catches it. */
export interface ErrorKind<C extends ErrorCode> {
  readonly code: C
  create(message: string, options?: ErrorKindOptions): BaseError<C>
  is(err: unknown): err is BaseError<C>
}

/**
 * Declares an error code without a subclass. `defaults` apply to every error
 * the kind creates; per-call options win, and contexts are merged.
 *
 * @example
 * ```ts
 * const DocumentNotFound = errorKind("document_not_found")
 *
 * throw DocumentNotFound.create("config.yml does not exist", { context: { name: "config.yml" } })
 * ```
 */
export function errorKind<C extends ErrorCode>(
  code: C,
  defaults: ErrorKindOptions = {},
): ErrorKind<C> {
  return {
    code,
    create: (message, options = {}) =>
      new BaseError(message, {
        ...defaults,
        ...options,
        code,
        context: { ...defaults.context, ...options.context },
      }),
    is: (err): err is BaseError<C> => err instanceof BaseError && err.code === code,
  }
}
