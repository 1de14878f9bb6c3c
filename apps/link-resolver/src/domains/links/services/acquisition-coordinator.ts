import type { TimeSource, UnixMs } from "@durable-links/clock"
import { errorMessage } from "@durable-links/errors"
import type { Logger } from "@durable-links/logger"
import type { SettledAcquisition } from "../model/acquisition.model"
import type { ItemId } from "../model/link.model"

export type AcquisitionCoordinatorDeps = {
  clock: TimeSource
  logger: Logger
}

export type JoinedAcquisition = {
  value: SettledAcquisition

  /** This caller started the acquisition. */
  isLeader: boolean

  /** Callers other than this one still waiting when it settled. */
  sharedWith: number
}

/** Read-only view of a running acquisition. */
export type InFlightAcquisition = Readonly<{
  itemId: ItemId
  startedAt: UnixMs
  /** Callers currently waiting, leader included. */
  subscriberCount: number
}>

type Flight = {
  readonly itemId: ItemId
  readonly startedAt: UnixMs
  readonly settled: Promise<SettledAcquisition>
  subscriberCount: number
}

/**
 * At most one acquisition per item id in flight. Joiners never call
 * `pipelineFn`; every subscriber gets the same settled object. No retries and
 * no timeout of its own.
 */
export class AcquisitionCoordinator {
  private readonly flights = new Map<ItemId, Flight>()

  public constructor(private readonly deps: AcquisitionCoordinatorDeps) {}

  /**
   * Starts an acquisition for `itemId` or joins the running one. The flight is
   * registered before `pipelineFn` is invoked, and the next call after it
   * settles starts fresh.
   *
   * Aborting `signal` withdraws this caller from the subscriber count. The
   * acquisition keeps running and the returned promise still settles with it.
   */
  run(
    itemId: ItemId,
    pipelineFn: () => Promise<SettledAcquisition>,
    signal?: AbortSignal,
  ): Promise<JoinedAcquisition> {
    const existing = this.flights.get(itemId)

    if (existing !== undefined) return this.wait(existing, false, signal)

    const flight: Flight = {
      itemId,
      startedAt: this.deps.clock.nowMs(),
      settled: Promise.resolve().then(() => this.settle(itemId, pipelineFn)),
      subscriberCount: 0,
    }

    this.flights.set(itemId, flight)

    return this.wait(flight, true, signal)
  }

  inspect(itemId: ItemId): InFlightAcquisition | undefined {
    const flight = this.flights.get(itemId)

    if (flight === undefined) return undefined

    return {
      itemId: flight.itemId,
      startedAt: flight.startedAt,
      subscriberCount: flight.subscriberCount,
    }
  }

  private async wait(
    flight: Flight,
    isLeader: boolean,
    signal: AbortSignal | undefined,
  ): Promise<JoinedAcquisition> {
    let waiting = signal?.aborted !== true

    const withdraw = (): void => {
      waiting = false
      flight.subscriberCount--
    }

    if (waiting) {
      flight.subscriberCount++
      signal?.addEventListener("abort", withdraw, { once: true })
    }

    try {
      const value = await flight.settled

      return { value, isLeader, sharedWith: flight.subscriberCount - (waiting ? 1 : 0) }
    } finally {
      signal?.removeEventListener("abort", withdraw)
    }
  }

  private async settle(
    itemId: ItemId,
    pipelineFn: () => Promise<SettledAcquisition>,
  ): Promise<SettledAcquisition> {
    try {
      return await pipelineFn()
    } catch (err) {
      this.deps.logger.error("Acquisition threw", { itemId, err })

      return {
        result: { kind: "failed", errorKind: "unknown", detail: errorMessage(err) },
        cacheWriteFailed: false,
      }
    } finally {
      this.flights.delete(itemId)
    }
  }
}
