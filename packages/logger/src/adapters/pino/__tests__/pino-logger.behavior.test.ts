import { Writable } from "node:stream"
import type { LogLevelName } from "../../../ports/log-level"
import { createPinoLogger } from "../pino-logger"

function capture(level: LogLevelName = "trace") {
  const entries: Record<string, unknown>[] = []

  const destination = new Writable({
    write(chunk, _encoding, done) {
      entries.push(JSON.parse(String(chunk)))
      done()
    },
  })

  return { entries, logger: createPinoLogger({ level, destination, bindings: { service: "links" } }) }
}

describe("createPinoLogger", () => {
  it("writes one JSON line per entry with bindings and meta", () => {
    const { entries, logger } = capture()

    logger.info("Link resolved", { itemId: "12345", durationMs: 840 })

    expect(entries).toHaveLength(1)
    expect(entries[0]).toMatchObject({
      level: 30,
      msg: "Link resolved",
      service: "links",
      itemId: "12345",
      durationMs: 840,
    })
  })

  it("drops entries below the configured level", () => {
    const { entries, logger } = capture("warn")

    logger.debug("Link cache hit")
    logger.info("Link resolved")
    logger.warn("Link cache write failed")
    logger.error("Acquisition threw")

    expect(entries.map((e) => e["msg"])).toEqual(["Link cache write failed", "Acquisition threw"])
  })

  it("child loggers add bindings without touching the parent", () => {
    const { entries, logger } = capture()

    const request = logger.child({ requestId: "req-1" })
    const item = request.child({ itemId: "12345" })

    request.info("Request completed")
    item.info("Artifact uploaded")

    expect(entries[0]).toMatchObject({ service: "links", requestId: "req-1" })
    expect(entries[0]).not.toHaveProperty("itemId")
    expect(entries[1]).toMatchObject({ service: "links", requestId: "req-1", itemId: "12345" })
  })

  it("lets per-call meta override a bound field", () => {
    const { entries, logger } = capture()

    logger.child({ module: "links" }).warn("Redis client error", { module: "redis" })

    expect(entries[0]?.["module"]).toBe("redis")
  })

  it("serializes err together with its cause", () => {
    const { entries, logger } = capture()

    logger.error("Acquisition upload failed", {
      err: new Error("rclone exited with 1", { cause: new Error("quota exceeded") }),
    })

    expect(entries[0]?.["err"]).toMatchObject({
      type: "Error",
      message: "rclone exited with 1",
      cause: { type: "Error", message: "quota exceeded" },
    })
  })
})
