import { z } from "zod/mini"

/** Opaque, used verbatim as cache key suffix and pipeline input. */
export type ItemId = string

export type DurableLink = string

export const cacheEntrySchema = z.object({
  itemId: z.string(),
  link: z.string(),
  resolvedAt: z.date(),
  ttlSeconds: z.optional(z.number()),
})

export type CacheEntry = z.infer<typeof cacheEntrySchema>

/** Where cache entries live. One entry per item id; the last write wins. */
export interface LinkEntryStore {
  read(itemId: ItemId): Promise<CacheEntry | undefined>

  /** Expires after `entry.ttlSeconds` when set. */
  write(entry: CacheEntry): Promise<void>

  remove(itemId: ItemId): Promise<void>
}

/** Response shape of both link routes. */
export type FetchedLink = {
  id: ItemId
  cached: boolean
  url: DurableLink
}

export type FetchOutcome = {
  link: FetchedLink

  /** The link was resolved but could not be cached. */
  cacheWriteFailed: boolean
}
