import { FakeClock } from "@durable-links/clock"
import { mock, type MockProxy } from "vitest-mock-extended"
import { MemoryLinkEntries } from "../../infra/memory-link-entries"
import { LinkStoreError } from "../../model/link.errors"
import type { LinkEntryStore } from "../../model/link.model"
import { LinkCacheStore } from "../link-cache-store"

const START_MS = 1_700_000_000_000
const LINK = "https://mega.nz/file/abc"

describe("LinkCacheStore", () => {
  let clock: FakeClock
  let store: LinkCacheStore

  beforeEach(() => {
    clock = new FakeClock(START_MS)

    store = new LinkCacheStore(
      { entries: new MemoryLinkEntries(clock, { maxEntries: 10 }), clock },
      { defaultTtlSeconds: 60 },
    )
  })

  it("returns undefined for an id that was never stored", async () => {
    expect(await store.get("12345")).toBeUndefined()
  })

  it("round-trips an entry, resolution time included", async () => {
    const entry = await store.set("12345", LINK)

    expect(entry).toStrictEqual({
      itemId: "12345",
      link: LINK,
      resolvedAt: new Date(START_MS),
      ttlSeconds: 60,
    })
    expect(await store.get("12345")).toStrictEqual(entry)
  })

  it("expires entries after the default TTL", async () => {
    await store.set("12345", LINK)

    clock.advance(59_999)
    expect(await store.get("12345")).toBeDefined()

    clock.advance(1)
    expect(await store.get("12345")).toBeUndefined()
  })

  it("keeps entries forever when the TTL is 0", async () => {
    const entry = await store.set("12345", LINK, 0)

    clock.advance(30 * 86_400_000)

    expect(entry.ttlSeconds).toBeUndefined()
    expect(await store.get("12345")).toStrictEqual(entry)
  })

  it("overwrites an existing entry", async () => {
    await store.set("12345", LINK)
    await store.set("12345", "https://mega.nz/file/def")

    expect((await store.get("12345"))?.link).toBe("https://mega.nz/file/def")
  })

  it("drops an entry on invalidate", async () => {
    await store.set("12345", LINK)
    await store.invalidate("12345")

    expect(await store.get("12345")).toBeUndefined()
  })

  describe("backend interaction", () => {
    let entries: MockProxy<LinkEntryStore>

    beforeEach(() => {
      entries = mock<LinkEntryStore>()
      store = new LinkCacheStore({ entries, clock }, { defaultTtlSeconds: 60 })
    })

    it("writes the entry with the TTL given", async () => {
      entries.write.mockResolvedValue()

      await store.set("12345", LINK, 30)

      expect(entries.write).toHaveBeenCalledExactlyOnceWith({
        itemId: "12345",
        link: LINK,
        resolvedAt: new Date(START_MS),
        ttlSeconds: 30,
      })
    })

    it("writes without a TTL when it is 0", async () => {
      entries.write.mockResolvedValue()

      await store.set("12345", LINK, 0)

      expect(entries.write).toHaveBeenCalledExactlyOnceWith({
        itemId: "12345",
        link: LINK,
        resolvedAt: new Date(START_MS),
      })
    })

    it("wraps read failures", async () => {
      const cause = new Error("connection refused")
      entries.read.mockRejectedValue(cause)

      const err = await store.get("12345").catch((e: unknown) => e)

      expect(err).toBeInstanceOf(LinkStoreError)
      expect(err).toMatchObject({
        code: "link_store_read_failed",
        context: { itemId: "12345" },
        cause,
      })
    })

    it("wraps write failures", async () => {
      entries.write.mockRejectedValue(new Error("READONLY"))

      await expect(store.set("12345", LINK)).rejects.toMatchObject({
        code: "link_store_write_failed",
        message: "Failed to cache link for 12345",
      })
    })

    it("wraps invalidate failures", async () => {
      entries.remove.mockRejectedValue(new Error("READONLY"))

      await expect(store.invalidate("12345")).rejects.toMatchObject({
        code: "link_store_write_failed",
        context: { itemId: "12345" },
      })
    })
  })
})
