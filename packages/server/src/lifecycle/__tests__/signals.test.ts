import { EventEmitter } from "node:events"
import type { Logger } from "@durable-links/logger"
import type { Mock } from "vitest"
import { mock, type MockProxy } from "vitest-mock-extended"
import type { StopReport } from "../hooks"
import { type ProcessSignalOptions, watchProcessSignals } from "../signals"

const clean: StopReport = { ok: true, failures: [], timedOut: false }

describe("watchProcessSignals", () => {
  let logger: MockProxy<Logger>
  let target: EventEmitter
  let exit: Mock<(code: number) => void>
  let stop: Mock<() => Promise<StopReport>>

  beforeEach(() => {
    logger = mock<Logger>()
    target = new EventEmitter()
    exit = vi.fn<(code: number) => void>()
    stop = vi.fn(async () => clean)
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  function watch(overrides: Partial<ProcessSignalOptions> = {}): () => void {
    return watchProcessSignals({ logger, stop, exit, target, ...overrides })
  }

  it("listens for stop signals and fatal errors, and removes every listener", () => {
    const unwatch = watch()

    expect(target.eventNames()).toEqual([
      "SIGINT",
      "SIGTERM",
      "uncaughtException",
      "unhandledRejection",
    ])

    unwatch()

    expect(target.eventNames()).toEqual([])
  })

  it("stops once however many signals arrive and does not exit", async () => {
    watch()

    target.emit("SIGTERM")
    target.emit("SIGINT")

    await vi.waitFor(() => expect(stop).toHaveBeenCalledOnce())
    expect(logger.warn).toHaveBeenCalledWith("Shutdown requested", { signal: "SIGTERM" })
    expect(logger.info).toHaveBeenCalledWith("Already shutting down", { signal: "SIGINT" })
    expect(exit).not.toHaveBeenCalled()
  })

  it("logs which hooks failed during a signalled stop", async () => {
    stop.mockResolvedValue({
      ok: false,
      failures: [{ hook: "redis.quit", error: new Error("quit failed") }],
      timedOut: false,
    })
    watch()

    target.emit("SIGINT")

    await vi.waitFor(() =>
      expect(logger.error).toHaveBeenCalledWith("Shutdown finished with failures", {
        reason: "SIGINT",
        failedHooks: ["redis.quit"],
        timedOut: false,
      }),
    )
  })

  it("stops and then exits with code 1 on an uncaught exception", async () => {
    const err = new Error("browser crashed")
    watch()

    target.emit("uncaughtException", err)

    await vi.waitFor(() => expect(exit).toHaveBeenCalledExactlyOnceWith(1))
    expect(stop).toHaveBeenCalledOnce()
    expect(logger.fatal).toHaveBeenCalledWith("Fatal error", { reason: "uncaughtException", err })
  })

  it("exits at once on a fatal error while already stopping", () => {
    watch({ stop: () => new Promise<StopReport>(() => {}) })

    target.emit("SIGTERM")
    target.emit("unhandledRejection", new Error("late rejection"))

    expect(exit).toHaveBeenCalledExactlyOnceWith(1)
  })

  it("forces an exit when the stop after a fatal error hangs", () => {
    vi.useFakeTimers()
    watch({ stop: () => new Promise<StopReport>(() => {}), fatalStopTimeoutMs: 500 })

    target.emit("uncaughtException", new Error("browser crashed"))

    vi.advanceTimersByTime(499)
    expect(exit).not.toHaveBeenCalled()

    vi.advanceTimersByTime(1)
    expect(exit).toHaveBeenCalledExactlyOnceWith(1)
  })
})
