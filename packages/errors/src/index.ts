export { BaseError, type BaseErrorOptions } from "./core/base-error"
export { errorMessage } from "./core/utils/error-message"
export { isAppError } from "./core/utils/is-app-error"
export type { AppError, ErrorCode, ErrorContext } from "./ports/error"
