import { FakeClock } from "@durable-links/clock"
import type { Logger } from "@durable-links/logger"
import { Hono } from "hono"
import { mock, type MockProxy } from "vitest-mock-extended"
import { type RequestContextOptions, requestContext } from "../request-context"

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/

describe("requestContext", () => {
  let logger: MockProxy<Logger>
  let requestLogger: MockProxy<Logger>
  let clock: FakeClock

  beforeEach(() => {
    logger = mock<Logger>()
    requestLogger = mock<Logger>()
    logger.child.mockReturnValue(requestLogger)
    clock = new FakeClock(1_000)
  })

  function appWith(overrides: Partial<RequestContextOptions> = {}): Hono {
    const app = new Hono()

    app.use(
      "*",
      requestContext(
        {
          requestId: { header: "x-request-id", fallbackToTraceparent: false },
          requestLogLevel: "info",
          ...overrides,
        },
        { logger, clock },
      ),
    )
    app.get("/links/:id", (c) => {
      clock.advance(25)
      return c.text(c.get("requestId") ?? "none")
    })
    app.get("/unavailable", (c) => c.text("down", 503))

    return app
  }

  it("takes the id from the request header and echoes it", async () => {
    const res = await appWith().request("/links/12345", { headers: { "x-request-id": "req-1" } })

    expect(await res.text()).toBe("req-1")
    expect(res.headers.get("x-request-id")).toBe("req-1")
  })

  it("generates a UUID when the header is missing or too long", async () => {
    const missing = await appWith().request("/links/12345")
    const tooLong = await appWith().request("/links/12345", {
      headers: { "x-request-id": "r".repeat(129) },
    })

    expect(await missing.text()).toMatch(UUID)
    expect(await tooLong.text()).toMatch(UUID)
  })

  it("falls back to the traceparent trace id when enabled", async () => {
    const app = appWith({ requestId: { header: "x-request-id", fallbackToTraceparent: true } })

    const res = await app.request("/links/12345", {
      headers: { traceparent: "00-4bf92f3577b34da6a3ce929d0e0e4736-00f067aa0ba902b7-01" },
    })

    expect(await res.text()).toBe("4bf92f3577b34da6a3ce929d0e0e4736")
  })

  it("ignores an all-zero trace id", async () => {
    const app = appWith({ requestId: { header: "x-request-id", fallbackToTraceparent: true } })

    const res = await app.request("/links/12345", {
      headers: { traceparent: `00-${"0".repeat(32)}-00f067aa0ba902b7-01` },
    })

    expect(await res.text()).toMatch(UUID)
  })

  it("logs one access line on a logger bound to the request id", async () => {
    await appWith().request("/links/12345", { headers: { "x-request-id": "req-1" } })

    expect(logger.child).toHaveBeenCalledExactlyOnceWith({ requestId: "req-1" })
    expect(requestLogger.info).toHaveBeenCalledExactlyOnceWith("Request completed", {
      method: "GET",
      path: "/links/12345",
      status: 200,
      durationMs: 25,
    })
  })

  it("logs 5xx responses at error whatever the configured level", async () => {
    await appWith({ requestLogLevel: "debug" }).request("/unavailable")

    expect(requestLogger.debug).not.toHaveBeenCalled()
    expect(requestLogger.error).toHaveBeenCalledWith(
      "Request completed",
      expect.objectContaining({ status: 503 }),
    )
  })

  it("neither assigns ids nor logs when both are turned off", async () => {
    const res = await appWith({ requestId: false, requestLogLevel: false }).request("/links/12345")

    expect(await res.text()).toBe("none")
    expect(res.headers.has("x-request-id")).toBe(false)
    expect(logger.child).not.toHaveBeenCalled()
    expect(logger.info).not.toHaveBeenCalled()
  })
})
