import { type AppError, type ErrorCode, isAppError } from "@durable-links/errors"
import type { Logger } from "@durable-links/logger"
import type { ErrorHandler } from "hono"
import type { ContentfulStatusCode } from "hono/utils/http-status"

export type ErrorResponse = {
  status: ContentfulStatusCode

  /** Shown to clients; keep internals out of it. */
  message: string
}

export type ErrorResponses = {
  /** AppErrors with an unlisted code keep that code but answer 500. */
  byCode: Partial<Record<ErrorCode, ErrorResponse>>

  /** Extra body fields for an AppError. */
  details?: (error: AppError) => Record<string, unknown> | undefined
}

export type ErrorBody = {
  error: {
    code: ErrorCode
    status: ContentfulStatusCode
    message: string
    requestId: string
    [detail: string]: unknown
  }
}

export const INTERNAL_ERROR = {
  code: "internal_error",
  status: 500,
  message: "An unexpected error occurred",
} as const satisfies ErrorResponse & { code: ErrorCode }

export function errorBody(responses: ErrorResponses, err: unknown, requestId: string): ErrorBody {
  if (!isAppError(err)) return { error: { ...INTERNAL_ERROR, requestId } }

  const response = responses.byCode[err.code] ?? INTERNAL_ERROR

  return {
    error: {
      ...responses.details?.(err),
      code: err.code,
      status: response.status,
      message: response.message,
      requestId,
    },
  }
}

/** Renders any thrown value as an `ErrorBody`; 5xx log at error with the error, 4xx at info. */
export function errorResponder(responses: ErrorResponses, baseLogger: Logger): ErrorHandler {
  return (err, c) => {
    const requestId = c.get("requestId") ?? "unknown"
    const body = errorBody(responses, err, requestId)
    const { status, code } = body.error
    const logger = c.get("logger") ?? baseLogger
    const meta = { method: c.req.method, path: c.req.path, status, code }

    if (status >= 500) logger.error("Request failed", { ...meta, err })
    else logger.info("Request failed", meta)

    return c.json(body, status)
  }
}
