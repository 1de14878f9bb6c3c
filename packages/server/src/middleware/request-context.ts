import { randomUUID } from "node:crypto"
import type { Clock } from "@durable-links/clock"
import type { LogLevelName, Logger } from "@durable-links/logger"
import type { MiddlewareHandler } from "hono"
import type { RequestIdOptions } from "../options"

export type RequestContextOptions = {
  requestId: RequestIdOptions | false
  requestLogLevel: LogLevelName | false
}

const MAX_INBOUND_ID_LENGTH = 128
const TRACE_ID = /^[0-9a-f]{32}$/i
const ZERO_TRACE_ID = /^0{32}$/

/**
 * Gives each request an id and a child logger bound to it, echoes the id on
 * the response and writes one access line when the request completes.
 */
export function requestContext(
  opts: RequestContextOptions,
  deps: { logger: Logger; clock: Clock },
): MiddlewareHandler {
  return async (c, next) => {
    const start = deps.clock.nowMs()
    const requestId = opts.requestId ? requestIdFor(c.req.header(), opts.requestId) : undefined
    const logger = requestId === undefined ? deps.logger : deps.logger.child({ requestId })

    if (requestId !== undefined) c.set("requestId", requestId)
    c.set("logger", logger)

    await next()

    if (opts.requestId && requestId !== undefined && !c.res.headers.has(opts.requestId.header)) {
      c.header(opts.requestId.header, requestId)
    }

    if (opts.requestLogLevel === false) return

    const status = c.res.status
    const meta = {
      method: c.req.method,
      path: c.req.path,
      status,
      durationMs: deps.clock.nowMs() - start,
    }

    if (status >= 500) logger.error("Request completed", meta)
    else logger[opts.requestLogLevel]("Request completed", meta)
  }
}

function requestIdFor(headers: Record<string, string>, opts: RequestIdOptions): string {
  const inbound = headers[opts.header.toLowerCase()]?.trim()

  if (inbound && inbound.length <= MAX_INBOUND_ID_LENGTH) return inbound

  if (opts.fallbackToTraceparent) {
    const traceId = headers["traceparent"]?.split("-")[1]

    if (traceId && TRACE_ID.test(traceId) && !ZERO_TRACE_ID.test(traceId)) return traceId
  }

  return randomUUID()
}
