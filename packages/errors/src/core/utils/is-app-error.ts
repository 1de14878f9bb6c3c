import type { AppError } from "../../ports/error"
import { BaseError } from "../base-error"

/** Also accepts errors built by another copy of this package. */
export function isAppError(err: unknown): err is AppError {
  if (err instanceof BaseError) return true
  if (!(err instanceof Error)) return false

  return (
    "code" in err &&
    typeof err.code === "string" &&
    "context" in err &&
    typeof err.context === "object" &&
    err.context !== null &&
    "isRetryable" in err &&
    typeof err.isRetryable === "boolean"
  )
}
