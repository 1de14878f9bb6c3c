import type { Sleeper } from "@durable-links/clock"
import type { Logger } from "@durable-links/logger"
import type { Hono } from "hono"
import type { HealthOptions, ReadinessCheck } from "../options"

const NO_STORE = { "Cache-Control": "no-store" } as const

export type HealthDeps = {
  isReady: () => boolean
  clock: Sleeper
  logger: Logger
}

type Verdict = "ready" | "not_ready" | "error" | "timeout"

/**
 * Liveness always answers 200. Readiness answers 503 with a `reason` while the
 * server is starting or stopping, or when a check fails; checks run in order.
 */
export function registerHealthRoutes(app: Hono, opts: HealthOptions, deps: HealthDeps): void {
  app.get(opts.livenessPath, (c) => c.json({ ok: true }, 200, NO_STORE))

  app.get(opts.readinessPath, async (c) => {
    const reason = deps.isReady() ? await firstFailingCheck(opts, deps) : "not_started"

    if (reason !== undefined) return c.json({ ok: false, reason }, 503, NO_STORE)

    return c.json({ ok: true }, 200, NO_STORE)
  })
}

async function firstFailingCheck(
  opts: HealthOptions,
  deps: HealthDeps,
): Promise<string | undefined> {
  for (const check of opts.checks) {
    const verdict = await runCheck(check, opts, deps)

    if (verdict === "not_ready") return check.name
    if (verdict !== "ready") return `${check.name}:${verdict}`
  }

  return undefined
}

async function runCheck(
  check: ReadinessCheck,
  opts: HealthOptions,
  deps: HealthDeps,
): Promise<Verdict> {
  const controller = new AbortController()

  const timedOut = deps.clock
    .sleep(opts.checkTimeoutMs, controller.signal)
    .then((): Verdict => "timeout")

  const checked = check.check(controller.signal).then(
    (ready): Verdict => (ready ? "ready" : "not_ready"),
    (err: unknown): Verdict => {
      deps.logger.warn("Readiness check failed", { check: check.name, err })

      return "error"
    },
  )

  try {
    return await Promise.race([checked, timedOut])
  } finally {
    controller.abort()
  }
}
