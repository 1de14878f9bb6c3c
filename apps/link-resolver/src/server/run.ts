import type { HttpServer } from "@durable-links/server"
import { type AppContextOptions, createAppContext } from "../app/create-context"
import { buildServer } from "./build-server"

export async function run(options: AppContextOptions = {}): Promise<HttpServer> {
  const ctx = await createAppContext(options)
  const { server } = buildServer(ctx)

  await server.handleProcessSignals().start()

  ctx.services.core.logger.info("Server started", {
    host: ctx.config.server.host,
    port: ctx.config.server.port,
    cacheBackend: ctx.config.links.cache.backend,
  })

  return server
}
