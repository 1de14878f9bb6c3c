import { createServer, type HttpServer, type LifecycleHook } from "@durable-links/server"
import type { Hono } from "hono"
import type { AppContext } from "../app/create-context"
import { createReadinessChecks } from "../app/lifecycle"

export type BuiltServer = {
  app: Hono
  server: HttpServer
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

export function buildServer(ctx: AppContext): BuiltServer {
  const { config } = ctx
  const startHooks = ctx.createStartHooks(ctx)
  const stopHooks = ctx.createStopHooks(ctx)

  const server = createServer(
    {
      clock: ctx.services.core.clock,
      logger: ctx.services.core.logger,
    },
    {
      host: config.server.host,
      port: config.server.port,
      shutdownTimeoutMs: config.server.shutdownTimeoutMs,

      errors: {
        byCode: {
          invalid_input: { status: 400, message: "Invalid item id" },
          validation_error: { status: 400, message: "Invalid request" },
          fetch_timeout: { status: 504, message: "Timed out resolving link" },
          pipeline_failure: { status: 502, message: "Failed to resolve link" },
        },
        details: (error) =>
          error.code === "pipeline_failure"
            ? { failureKind: error.context["failureKind"] }
            : undefined,
      },

      requestId: config.requestId.enabled
        ? {
            header: config.requestId.header,
            fallbackToTraceparent: config.requestId.fallbackToTraceparent,
          }
        : false,

      requestLogLevel: config.requestLogging.enabled ? config.requestLogging.level : false,

      health: {
        livenessPath: config.server.livenessPath,
        readinessPath: config.server.readinessPath,
        checks: createReadinessChecks(ctx),
        checkTimeoutMs: config.server.readinessCheckTimeoutMs,
      },

      routes: (app) => {
        ctx.registerRoutes(app, config, ctx.services.domains)
      },

      startHooks,
      stopHooks,
    },
  )

  return { app: server.app, server, startHooks, stopHooks }
}
