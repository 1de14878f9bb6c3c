import { createPinoLogger } from "@durable-links/logger"
import { run } from "./run"

run().catch((err: unknown) => {
  createPinoLogger({ bindings: { service: "link-resolver" } }).fatal("Failed to start server", {
    err,
  })
  process.exitCode = 1
})
