import type { EpochMs, Milliseconds } from "./time"

export type TimeSource = {
  /**
   * Current time as a Date.
   *
   * @remarks
   * Use `nowMs()` for arithmetic such as lease expiry.
   */
  now(): Date

  nowMs(): EpochMs
}

export interface Sleeper {
  /** Waits `ms` milliseconds. Resolves early once `signal` aborts. */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type Clock = TimeSource & Sleeper
