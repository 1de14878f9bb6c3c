import type { Milliseconds, UnixMs } from "./time"

export type TimeSource = {
  /** Current time as a Date. Prefer `nowMs()` for arithmetic. */
  now(): Date

  nowMs(): UnixMs
}

export interface Sleeper {
  /**
   * Resolve after `ms` milliseconds.
   *
   * Resolves early (never rejects) when `signal` aborts, so callers racing a
   * sleep against other work can release the timer once the race is decided.
   */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type Clock = TimeSource & Sleeper
