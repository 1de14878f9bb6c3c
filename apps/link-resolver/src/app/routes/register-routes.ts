import { Hono } from "hono"
import { createLinksModule, registerRootLinkRoute } from "../../domains/links"
import type { AppConfig } from "../config"
import type { DomainServices } from "../services"

export type ApiModule = {
  name: string
  register: (app: Hono) => void
}

export function registerRoutes(app: Hono, _config: AppConfig, services: DomainServices): void {
  const apiV1Router = new Hono()

  const modules: ApiModule[] = [createLinksModule({ links: services.links })]

  for (const m of modules) {
    m.register(apiV1Router)
  }

  app.route("/api/v1", apiV1Router)
  registerRootLinkRoute(app, { links: services.links })
}

export type RegisterRoutesFn = typeof registerRoutes
