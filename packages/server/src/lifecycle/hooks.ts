import type { Clock, Milliseconds } from "@durable-links/clock"
import { BaseError } from "@durable-links/errors"
import type { Logger } from "@durable-links/logger"

export type LifecycleHook = {
  name: string

  /** Stop hooks see `signal` abort once the shutdown deadline passes. */
  run: (signal: AbortSignal) => Promise<void>
}

export type HookFailure = {
  hook: string
  error: unknown
}

export type StopReport = {
  ok: boolean
  failures: HookFailure[]

  /** The deadline passed; the running hook was abandoned and the rest skipped. */
  timedOut: boolean
}

export type ServerErrorCode = "server_already_started" | "server_start_hook_failed"

export class ServerError extends BaseError<ServerErrorCode> {
  static alreadyStarted(): ServerError {
    return new ServerError("Server already started", { code: "server_already_started" })
  }

  static startHookFailed(hook: string, cause: unknown): ServerError {
    return new ServerError(`Start hook failed: ${hook}`, {
      code: "server_start_hook_failed",
      context: { hook },
      cause,
    })
  }
}

/** In order. The first failure aborts startup and the remaining hooks never run. */
export async function runStartHooks(hooks: LifecycleHook[], logger: Logger): Promise<void> {
  const signal = new AbortController().signal

  for (const hook of hooks) {
    try {
      await hook.run(signal)
    } catch (err) {
      logger.error(`Start hook failed: ${hook.name}`, { err })

      throw ServerError.startHookFailed(hook.name, err)
    }

    logger.debug(`Start hook done: ${hook.name}`)
  }
}

const EXPIRED = Symbol("expired")
const DONE = Symbol("done")

type HookOutcome = typeof DONE | typeof EXPIRED | { error: unknown }

/** In order, all under one deadline. A failing hook does not stop the next one. */
export async function runStopHooks(
  hooks: LifecycleHook[],
  deps: { clock: Clock; logger: Logger },
  timeoutMs: Milliseconds,
): Promise<StopReport> {
  const deadline = new AbortController()
  const expired = deps.clock.sleep(timeoutMs, deadline.signal).then((): typeof EXPIRED => {
    deadline.abort()

    return EXPIRED
  })

  const failures: HookFailure[] = []

  try {
    for (const [index, hook] of hooks.entries()) {
      const outcome: HookOutcome = await Promise.race([
        hook.run(deadline.signal).then(
          (): typeof DONE => DONE,
          (error: unknown) => ({ error }),
        ),
        expired,
      ])

      if (outcome === EXPIRED) {
        deps.logger.warn(`Shutdown deadline passed during stop hook: ${hook.name}`, {
          skipped: hooks.slice(index + 1).map((h) => h.name),
        })

        return { ok: false, failures, timedOut: true }
      }

      if (outcome === DONE) {
        deps.logger.debug(`Stop hook done: ${hook.name}`)
        continue
      }

      deps.logger.error(`Stop hook failed: ${hook.name}`, { err: outcome.error })
      failures.push({ hook: hook.name, error: outcome.error })
    }

    return { ok: failures.length === 0, failures, timedOut: false }
  } finally {
    deadline.abort()
  }
}
