import type { Milliseconds } from "@durable-links/clock"
import type { Logger } from "@durable-links/logger"
import type { StopReport } from "./hooks"

export type ProcessSignalOptions = {
  logger: Logger
  stop: () => Promise<StopReport>

  /** How long a stop caused by a fatal error may take before a hard exit. @default 10_000 */
  fatalStopTimeoutMs?: Milliseconds

  /** @default process.exit */
  exit?: (code: number) => void

  /** @default process */
  target?: NodeJS.EventEmitter
}

/**
 * SIGINT and SIGTERM start one graceful stop. An uncaught exception or an
 * unhandled rejection stops too, then exits with code 1. Returns a function
 * that removes every listener added here.
 */
export function watchProcessSignals(opts: ProcessSignalOptions): () => void {
  const { logger } = opts
  const target = opts.target ?? process
  const exit = opts.exit ?? ((code: number) => process.exit(code))
  const fatalStopTimeoutMs = opts.fatalStopTimeoutMs ?? 10_000

  let stopping = false

  const stopAndReport = (reason: string): Promise<void> =>
    opts.stop().then(
      (report) => {
        if (report.ok) return

        logger.error("Shutdown finished with failures", {
          reason,
          failedHooks: report.failures.map((f) => f.hook),
          timedOut: report.timedOut,
        })
      },
      (err: unknown) => {
        logger.error("Shutdown failed", { reason, err })
      },
    )

  const onStopSignal = (signal: NodeJS.Signals) => {
    if (stopping) {
      logger.info("Already shutting down", { signal })
      return
    }

    stopping = true
    logger.warn("Shutdown requested", { signal })
    void stopAndReport(signal)
  }

  const onFatal = (reason: string, err: unknown) => {
    logger.fatal("Fatal error", { reason, err })

    if (stopping) {
      exit(1)
      return
    }

    stopping = true

    const forceExit = setTimeout(() => {
      logger.fatal("Shutdown did not finish in time, exiting", { timeoutMs: fatalStopTimeoutMs })
      exit(1)
    }, fatalStopTimeoutMs)
    forceExit.unref()

    void stopAndReport(reason).finally(() => {
      clearTimeout(forceExit)
      exit(1)
    })
  }

  const listeners: Record<string, (arg: unknown) => void> = {
    SIGINT: () => onStopSignal("SIGINT"),
    SIGTERM: () => onStopSignal("SIGTERM"),
    uncaughtException: (err) => onFatal("uncaughtException", err),
    unhandledRejection: (reason) => onFatal("unhandledRejection", reason),
  }

  for (const [event, listener] of Object.entries(listeners)) target.on(event, listener)

  return () => {
    for (const [event, listener] of Object.entries(listeners)) target.off(event, listener)
  }
}
