import type { Seconds, TimeSource } from "@durable-links/clock"
import { LinkStoreError } from "../model/link.errors"
import type { CacheEntry, DurableLink, ItemId, LinkEntryStore } from "../model/link.model"

export type LinkCacheStoreDeps = {
  entries: LinkEntryStore
  clock: TimeSource
}

export type LinkCacheStoreOptions = {
  /** Applied when `set` gets no TTL. 0 disables expiry. */
  defaultTtlSeconds: Seconds
}

/**
 * Durable `itemId -> link` mapping. No client-side locking: single-key
 * atomicity of the backend is all it relies on.
 */
export class LinkCacheStore {
  public constructor(
    private readonly deps: LinkCacheStoreDeps,
    private readonly opts: LinkCacheStoreOptions,
  ) {}

  async get(itemId: ItemId): Promise<CacheEntry | undefined> {
    try {
      return await this.deps.entries.read(itemId)
    } catch (err) {
      throw LinkStoreError.readFailed(itemId, err)
    }
  }

  async set(itemId: ItemId, link: DurableLink, ttlSeconds?: Seconds): Promise<CacheEntry> {
    const ttl = ttlSeconds ?? this.opts.defaultTtlSeconds

    const entry: CacheEntry = {
      itemId,
      link,
      resolvedAt: this.deps.clock.now(),
      ...(ttl > 0 && { ttlSeconds: ttl }),
    }

    try {
      await this.deps.entries.write(entry)
    } catch (err) {
      throw LinkStoreError.writeFailed(itemId, err)
    }

    return entry
  }

  async invalidate(itemId: ItemId): Promise<void> {
    try {
      await this.deps.entries.remove(itemId)
    } catch (err) {
      throw LinkStoreError.writeFailed(itemId, err)
    }
  }
}
