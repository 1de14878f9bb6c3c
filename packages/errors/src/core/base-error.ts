import type { AppError, ErrorCode, ErrorContext } from "../ports/error"

export type BaseErrorOptions<C extends ErrorCode> = {
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
}

/**
 * Base for every error thrown on purpose. Subclasses narrow `C` to their own
 * codes and usually expose static constructors per failure.
 */
export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable: boolean

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })

    this.name = new.target.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
  }
}
