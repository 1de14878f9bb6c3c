import { Hono } from "hono"
import type { LinkServices } from "../composition"
import { getLinkByQueryHandler, getLinkHandler, invalidateLinkHandler } from "./get-link.handler"

type LinksModuleDeps = {
  links: LinkServices
}

export function createLinksModule(deps: LinksModuleDeps) {
  return {
    name: "links",
    register: (api: Hono) => {
      const links = new Hono()

      links.get("/:id", getLinkHandler(deps.links))
      links.delete("/:id", invalidateLinkHandler(deps.links))

      api.route("/links", links)
    },
  }
}

/** The short form served at the app root. */
export function registerRootLinkRoute(app: Hono, deps: LinksModuleDeps): void {
  app.get("/", getLinkByQueryHandler(deps.links))
}
