import { serve } from "@hono/node-server"
import type { Clock } from "@durable-links/clock"
import type { Logger } from "@durable-links/logger"
import { Hono } from "hono"
import { errorResponder } from "./errors/error-responder"
import {
  type LifecycleHook,
  runStartHooks,
  runStopHooks,
  ServerError,
  type StopReport,
} from "./lifecycle/hooks"
import { type ProcessSignalOptions, watchProcessSignals } from "./lifecycle/signals"
import { requestContext } from "./middleware/request-context"
import type { ServerOptions } from "./options"
import { registerHealthRoutes } from "./routes/health"

export interface Closeable {
  close(callback?: (err?: Error) => void): unknown
}

export type ListenFn = (app: Hono, host: string, port: number) => Closeable

export type ServerDependencies = {
  logger: Logger
  clock: Clock

  /** @default serving `app.fetch` with @hono/node-server */
  listen?: ListenFn
}

type ServerState = "idle" | "starting" | "started" | "stopping"

const listenWithNodeServer: ListenFn = (app, host, port) =>
  serve({ fetch: app.fetch, hostname: host, port })

export class HttpServer {
  /** Fully wired; tests drive it with `app.request()` without listening. */
  readonly app: Hono

  private state: ServerState = "idle"
  private listener: Closeable | undefined
  private stopping: Promise<StopReport> | undefined
  private unwatchSignals: (() => void) | undefined

  constructor(
    private readonly deps: ServerDependencies,
    private readonly options: ServerOptions,
  ) {
    this.app = this.buildApp()
  }

  /** Readiness: true between a successful start and the first stop. */
  isReady(): boolean {
    return this.state === "started"
  }

  async start(): Promise<void> {
    if (this.state !== "idle") throw ServerError.alreadyStarted()

    this.state = "starting"

    try {
      await runStartHooks(this.options.startHooks, this.deps.logger)
    } catch (err) {
      this.state = "idle"
      throw err
    }

    const { host, port } = this.options
    const listen = this.deps.listen ?? listenWithNodeServer

    this.listener = listen(this.app, host, port)
    this.state = "started"

    this.deps.logger.info(`Listening on http://${host}:${port}`)
  }

  /** Concurrent and repeated calls share one shutdown. */
  stop(): Promise<StopReport> {
    this.stopping ??= this.shutdown()

    return this.stopping
  }

  handleProcessSignals(overrides: Omit<ProcessSignalOptions, "logger" | "stop"> = {}): this {
    this.unwatchSignals ??= watchProcessSignals({
      ...overrides,
      logger: this.deps.logger,
      stop: () => this.stop(),
    })

    return this
  }

  private async shutdown(): Promise<StopReport> {
    this.state = "stopping"
    this.deps.logger.warn("Shutting down")

    const hooks = this.listener
      ? [closeListener(this.listener), ...this.options.stopHooks]
      : this.options.stopHooks

    const report = await runStopHooks(hooks, this.deps, this.options.shutdownTimeoutMs)

    this.unwatchSignals?.()
    this.deps.logger.info("Shutdown complete", { ok: report.ok, timedOut: report.timedOut })

    return report
  }

  /** Health routes come before the middleware, so health checks are neither logged nor given ids. */
  private buildApp(): Hono {
    const { deps, options } = this
    const app = new Hono()

    registerHealthRoutes(app, options.health, {
      isReady: () => this.isReady(),
      clock: deps.clock,
      logger: deps.logger,
    })

    app.use("*", requestContext(options, deps))
    options.routes(app)
    app.onError(errorResponder(options.errors, deps.logger))

    return app
  }
}

function closeListener(listener: Closeable): LifecycleHook {
  return {
    name: "http.close",
    run: () =>
      new Promise<void>((resolve, reject) => {
        listener.close((err) => (err ? reject(err) : resolve()))
      }),
  }
}

export function createServer(deps: ServerDependencies, options: ServerOptions): HttpServer {
  return new HttpServer(deps, options)
}
