import type { Clock, Milliseconds } from "@durable-links/clock"
import type { Logger } from "@durable-links/logger"
import type { AcquisitionPipeline, SettledAcquisition } from "../model/acquisition.model"
import { FetchError } from "../model/link.errors"
import type { FetchOutcome, ItemId } from "../model/link.model"
import type { AcquisitionCoordinator, JoinedAcquisition } from "./acquisition-coordinator"
import type { LinkCacheStore } from "./link-cache-store"

export type FetchOrchestratorDeps = {
  clock: Clock
  logger: Logger
  store: LinkCacheStore
  coordinator: AcquisitionCoordinator
  pipeline: AcquisitionPipeline
}

export type FetchOrchestratorOptions = {
  /** Bounds each caller's wait, never the flight itself. */
  timeoutMs: Milliseconds
}

const TIMED_OUT = Symbol("timed-out")

export class FetchOrchestrator {
  public constructor(
    private readonly deps: FetchOrchestratorDeps,
    private readonly opts: FetchOrchestratorOptions,
  ) {}

  async fetch(itemId: ItemId): Promise<FetchOutcome> {
    if (itemId.length === 0) throw FetchError.invalidInput("Item id must not be empty")

    const cached = await this.readCache(itemId)

    if (cached !== undefined) {
      this.deps.logger.debug("Link cache hit", { itemId })

      return { link: { id: itemId, cached: true, url: cached }, cacheWriteFailed: false }
    }

    const start = this.deps.clock.nowMs()
    const flight = await this.waitForFlight(itemId)
    const { result, cacheWriteFailed } = flight.value

    if (result.kind === "failed") {
      this.deps.logger.warn("Link acquisition failed", {
        itemId,
        failureKind: result.errorKind,
        detail: result.detail,
        isLeader: flight.isLeader,
      })

      throw FetchError.pipelineFailure(itemId, result)
    }

    this.deps.logger.info("Link resolved", {
      itemId,
      durationMs: this.deps.clock.nowMs() - start,
      isLeader: flight.isLeader,
      sharedWith: flight.sharedWith,
    })

    return { link: { id: itemId, cached: false, url: result.link }, cacheWriteFailed }
  }

  /** A failed read is a miss: availability over staleness. */
  private async readCache(itemId: ItemId): Promise<string | undefined> {
    try {
      const entry = await this.deps.store.get(itemId)

      return entry?.link
    } catch (err) {
      this.deps.logger.warn("Link cache read failed, treating as miss", { itemId, err })

      return undefined
    }
  }

  /** Runs inside the flight: the write lands before any waiter is released. */
  private async acquireAndCache(itemId: ItemId): Promise<SettledAcquisition> {
    const result = await this.deps.pipeline.acquire(itemId)

    if (result.kind === "failed") return { result, cacheWriteFailed: false }

    try {
      await this.deps.store.set(itemId, result.link)

      return { result, cacheWriteFailed: false }
    } catch (err) {
      this.deps.logger.warn("Link cache write failed, returning link uncached", { itemId, err })

      return { result, cacheWriteFailed: true }
    }
  }

  /** Abandoning the wait on timeout withdraws this caller from the flight. */
  private async waitForFlight(itemId: ItemId): Promise<JoinedAcquisition> {
    const waiter = new AbortController()
    const joined = this.deps.coordinator.run(
      itemId,
      () => this.acquireAndCache(itemId),
      waiter.signal,
    )
    const timedOut = this.deps.clock
      .sleep(this.opts.timeoutMs, waiter.signal)
      .then((): typeof TIMED_OUT => TIMED_OUT)

    try {
      const winner = await Promise.race([joined, timedOut])

      if (winner === TIMED_OUT) {
        waiter.abort()
        this.logTimeout(itemId)

        throw FetchError.timeout(itemId, this.opts.timeoutMs)
      }

      return winner
    } finally {
      waiter.abort()
    }
  }

  private logTimeout(itemId: ItemId): void {
    const running = this.deps.coordinator.inspect(itemId)

    this.deps.logger.warn("Timed out waiting for link acquisition", {
      itemId,
      timeoutMs: this.opts.timeoutMs,
      ...(running !== undefined && {
        runningForMs: this.deps.clock.nowMs() - running.startedAt,
        stillWaiting: running.subscriberCount,
      }),
    })
  }
}
