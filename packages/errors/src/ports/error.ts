/** Machine-readable and stable; HTTP mappings and logs key on it. */
export type ErrorCode = Lowercase<string>

export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /** Repeating the same call later may succeed. */
  readonly isRetryable: boolean
}
