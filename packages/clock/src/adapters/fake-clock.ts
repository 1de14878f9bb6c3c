import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

type PendingSleep = {
  wakeAt: UnixMs
  wake: () => void
}

/**
 * Manually driven clock.
 *
 * `sleep()` parks the caller until `advance()` or `set()` moves time past its
 * wake-up instant, which lets tests decide exactly when a timeout fires.
 */
export class FakeClock implements Clock {
  private time: UnixMs
  private sleepers: PendingSleep[] = []

  constructor(start: UnixMs = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.set(this.time + ms)
  }

  set(ms: UnixMs): void {
    this.time = ms
    this.wakeDue()
  }

  /** Number of sleeps that have not woken yet. */
  get pendingSleeps(): number {
    return this.sleepers.length
  }

  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return Promise.resolve()

    return new Promise((resolve) => {
      const entry: PendingSleep = {
        wakeAt: this.time + ms,
        wake: () => {
          signal?.removeEventListener("abort", onAbort)
          resolve()
        },
      }

      const onAbort = () => {
        this.sleepers = this.sleepers.filter((s) => s !== entry)
        resolve()
      }

      signal?.addEventListener("abort", onAbort, { once: true })
      this.sleepers.push(entry)
    })
  }

  private wakeDue(): void {
    const due = this.sleepers.filter((s) => s.wakeAt <= this.time)
    if (due.length === 0) return

    this.sleepers = this.sleepers.filter((s) => s.wakeAt > this.time)
    for (const s of due) s.wake()
  }
}
