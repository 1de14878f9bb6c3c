import superjson from "superjson"
import { linkCacheKey } from "../keyspace"
import { type CacheEntry, cacheEntrySchema, type ItemId, type LinkEntryStore } from "../model/link.model"
import type { RedisClient } from "./redis-client"

export type RedisLinkEntriesOptions = {
  keyPrefix: string
}

/**
 * Entries as superjson strings under `<prefix>:links:<itemId>`, so
 * `resolvedAt` comes back as a Date. Expiry is Redis' own `EX`.
 */
export class RedisLinkEntries implements LinkEntryStore {
  public constructor(
    private readonly client: RedisClient,
    private readonly opts: RedisLinkEntriesOptions,
  ) {}

  /** Rejects when the stored value is not a cache entry. */
  async read(itemId: ItemId): Promise<CacheEntry | undefined> {
    const raw = await this.client.get(this.key(itemId))

    if (raw === null) return undefined

    return cacheEntrySchema.parse(superjson.parse(raw))
  }

  async write(entry: CacheEntry): Promise<void> {
    const key = this.key(entry.itemId)
    const value = superjson.stringify(entry)

    if (entry.ttlSeconds === undefined) {
      await this.client.set(key, value)
    } else {
      await this.client.set(key, value, { EX: entry.ttlSeconds })
    }
  }

  async remove(itemId: ItemId): Promise<void> {
    await this.client.del(this.key(itemId))
  }

  private key(itemId: ItemId): string {
    return linkCacheKey(this.opts.keyPrefix, itemId)
  }
}
