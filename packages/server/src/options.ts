import type { Milliseconds } from "@durable-links/clock"
import type { LogLevelName } from "@durable-links/logger"
import type { Hono } from "hono"
import type { ErrorResponses } from "./errors/error-responder"
import type { LifecycleHook } from "./lifecycle/hooks"

export type PathString = `/${string}`

/** Longest delay `setTimeout` honours. Anything above fires after about 1ms. */
export const MAX_TIMER_MS: Milliseconds = 2_147_483_647

export type RequestIdOptions = {
  header: string

  /** Reuse the trace id of a W3C `traceparent` header when `header` is absent. */
  fallbackToTraceparent: boolean
}

export type ReadinessCheck = {
  name: string
  check: (signal: AbortSignal) => Promise<boolean>
}

export type HealthOptions = {
  livenessPath: PathString
  readinessPath: PathString
  checks: ReadinessCheck[]
  checkTimeoutMs: Milliseconds
}

export type ServerOptions = {
  host: string
  port: number
  shutdownTimeoutMs: Milliseconds

  /** `false` leaves requests without an id. */
  requestId: RequestIdOptions | false

  /** Level of the per-request access line; 5xx always log at `error`. */
  requestLogLevel: LogLevelName | false

  health: HealthOptions
  errors: ErrorResponses
  routes: (app: Hono) => void

  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}
