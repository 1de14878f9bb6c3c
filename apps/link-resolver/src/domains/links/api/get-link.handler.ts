import { parseOrThrow } from "@durable-links/server"
import type { Context, Handler } from "hono"
import type { LinkServices } from "../composition"
import type { FetchedLink, ItemId } from "../model/link.model"
import { linkQuerySchema } from "./link.api.schema"

export const CACHE_WARNING_HEADER = "x-cache-warning"

/** `GET /?id=<itemId>` */
export function getLinkByQueryHandler(deps: LinkServices): Handler {
  return async (c) => {
    const { id } = parseOrThrow(linkQuerySchema, c.req.query())

    return respondWithLink(c, deps, id)
  }
}

/** `GET /links/:id` */
export function getLinkHandler(deps: LinkServices): Handler {
  return async (c) => respondWithLink(c, deps, c.req.param("id") ?? "")
}

/** `DELETE /links/:id`: the next request for the id acquires it again. */
export function invalidateLinkHandler({ store }: LinkServices): Handler {
  return async (c) => {
    const id = c.req.param("id") ?? ""

    await store.invalidate(id)

    return c.body(null, 204)
  }
}

async function respondWithLink(c: Context, { orchestrator }: LinkServices, id: ItemId) {
  const { link, cacheWriteFailed } = await orchestrator.fetch(id)

  if (cacheWriteFailed) c.header(CACHE_WARNING_HEADER, "cache-write-failed")

  return c.json<FetchedLink>(link)
}
