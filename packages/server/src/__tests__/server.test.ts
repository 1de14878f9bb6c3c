import { EventEmitter } from "node:events"
import { FakeClock } from "@durable-links/clock"
import { BaseError } from "@durable-links/errors"
import type { Logger } from "@durable-links/logger"
import type { Mock } from "vitest"
import { mock, type MockProxy } from "vitest-mock-extended"
import type { LifecycleHook } from "../lifecycle/hooks"
import type { ServerOptions } from "../options"
import { type Closeable, HttpServer, type ListenFn } from "../server"

class LinkError extends BaseError<"invalid_input"> {}

describe("HttpServer", () => {
  let logger: MockProxy<Logger>
  let clock: FakeClock
  let calls: string[]
  let listen: Mock<ListenFn>

  beforeEach(() => {
    logger = mock<Logger>()
    logger.child.mockReturnValue(logger)
    clock = new FakeClock(0)
    calls = []
    listen = vi.fn<ListenFn>(
      (): Closeable => ({
        close: (done) => {
          calls.push("http.close")
          done?.()
        },
      }),
    )
  })

  function hook(name: string): LifecycleHook {
    return {
      name,
      run: async () => {
        calls.push(name)
      },
    }
  }

  function options(overrides: Partial<ServerOptions> = {}): ServerOptions {
    return {
      host: "127.0.0.1",
      port: 8080,
      shutdownTimeoutMs: 1_000,
      requestId: { header: "x-request-id", fallbackToTraceparent: false },
      requestLogLevel: "info",
      health: {
        livenessPath: "/health/live",
        readinessPath: "/health/ready",
        checks: [],
        checkTimeoutMs: 1_000,
      },
      errors: { byCode: { invalid_input: { status: 400, message: "Invalid item id" } } },
      routes: (app) => {
        app.get("/links/:id", (c) => c.json({ id: c.req.param("id") }))
        app.get("/links", () => {
          throw new LinkError("Item id must not be empty", { code: "invalid_input" })
        })
      },
      startHooks: [hook("redis.connect")],
      stopHooks: [hook("redis.quit")],
      ...overrides,
    }
  }

  function serverWith(overrides: Partial<ServerOptions> = {}): HttpServer {
    return new HttpServer({ logger, clock, listen }, options(overrides))
  }

  it("serves routes with a request id before it is started", async () => {
    const res = await serverWith().app.request("/links/12345", {
      headers: { "x-request-id": "req-1" },
    })

    expect(res.status).toBe(200)
    expect(res.headers.get("x-request-id")).toBe("req-1")
    expect(await res.json()).toStrictEqual({ id: "12345" })
  })

  it("turns thrown AppErrors into mapped error bodies carrying the request id", async () => {
    const res = await serverWith().app.request("/links", { headers: { "x-request-id": "req-2" } })

    expect(res.status).toBe(400)
    expect(await res.json()).toStrictEqual({
      error: { code: "invalid_input", status: 400, message: "Invalid item id", requestId: "req-2" },
    })
  })

  it("runs start hooks, then listens and turns ready", async () => {
    const server = serverWith()

    expect((await server.app.request("/health/ready")).status).toBe(503)

    await server.start()

    expect(calls).toEqual(["redis.connect"])
    expect(listen).toHaveBeenCalledExactlyOnceWith(server.app, "127.0.0.1", 8080)
    expect(server.isReady()).toBe(true)
    expect((await server.app.request("/health/ready")).status).toBe(200)
  })

  it("does not listen when a start hook fails, and can be started again", async () => {
    const failing: LifecycleHook = {
      name: "redis.connect",
      run: async () => {
        throw new Error("ECONNREFUSED")
      },
    }
    const server = serverWith({ startHooks: [failing] })

    await expect(server.start()).rejects.toMatchObject({ code: "server_start_hook_failed" })
    expect(listen).not.toHaveBeenCalled()
    expect(server.isReady()).toBe(false)

    await expect(server.start()).rejects.toMatchObject({ code: "server_start_hook_failed" })
  })

  it("refuses a second start", async () => {
    const server = serverWith()

    await server.start()

    await expect(server.start()).rejects.toMatchObject({ code: "server_already_started" })
  })

  it("closes the listener before the stop hooks and shares one shutdown", async () => {
    const server = serverWith()
    await server.start()
    calls.length = 0

    const first = server.stop()
    const second = server.stop()

    expect(second).toBe(first)
    expect(await first).toStrictEqual({ ok: true, failures: [], timedOut: false })
    expect(calls).toEqual(["http.close", "redis.quit"])
    expect(server.isReady()).toBe(false)
  })

  it("runs only the stop hooks when stopped before it listened", async () => {
    const report = await serverWith().stop()

    expect(report.ok).toBe(true)
    expect(calls).toEqual(["redis.quit"])
  })

  it("removes its process listeners once stopped", async () => {
    const target = new EventEmitter()
    const server = serverWith().handleProcessSignals({ target, exit: vi.fn() })

    expect(target.listenerCount("SIGTERM")).toBe(1)

    await server.stop()

    expect(target.eventNames()).toEqual([])
  })
})
