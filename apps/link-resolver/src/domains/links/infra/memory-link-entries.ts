import type { TimeSource, UnixMs } from "@durable-links/clock"
import type { CacheEntry, ItemId, LinkEntryStore } from "../model/link.model"

export type MemoryLinkEntriesOptions = {
  /** Once full, each write evicts the entry written longest ago. */
  maxEntries: number
}

type StoredEntry = {
  entry: CacheEntry
  expiresAt: UnixMs | undefined
}

/** Process-local entries for single-instance deployments and tests. */
export class MemoryLinkEntries implements LinkEntryStore {
  private readonly entries = new Map<ItemId, StoredEntry>()

  public constructor(
    private readonly clock: TimeSource,
    private readonly opts: MemoryLinkEntriesOptions,
  ) {}

  async read(itemId: ItemId): Promise<CacheEntry | undefined> {
    const stored = this.entries.get(itemId)

    if (stored === undefined) return undefined

    if (stored.expiresAt !== undefined && stored.expiresAt <= this.clock.nowMs()) {
      this.entries.delete(itemId)
      return undefined
    }

    return stored.entry
  }

  async write(entry: CacheEntry): Promise<void> {
    // Rewriting an id moves it to the back of the eviction order.
    this.entries.delete(entry.itemId)

    if (this.entries.size >= this.opts.maxEntries) this.evictOldest()

    this.entries.set(entry.itemId, {
      entry,
      expiresAt:
        entry.ttlSeconds === undefined ? undefined : this.clock.nowMs() + entry.ttlSeconds * 1000,
    })
  }

  async remove(itemId: ItemId): Promise<void> {
    this.entries.delete(itemId)
  }

  get size(): number {
    return this.entries.size
  }

  private evictOldest(): void {
    const oldest = this.entries.keys().next()

    if (!oldest.done) this.entries.delete(oldest.value)
  }
}
