import type { Clock } from "../ports/clock"
import type { EpochMs, Milliseconds } from "../ports/time"

/**
 * Manually driven clock for tests.
 *
 * `sleep()` never schedules a timer: it moves the clock forward by the
 * requested amount and resolves on the next microtask, so polling loops
 * built on it reach their deadline deterministically.
 */
export class FakeClock implements Clock {
  private time: EpochMs
  private sleeps = 0

  constructor(start: EpochMs = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): EpochMs {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time += ms
  }

  set(ms: EpochMs): void {
    this.time = ms
  }

  /** Number of `sleep()` calls that advanced time. */
  get sleepCount(): number {
    return this.sleeps
  }

  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted || ms <= 0) return
    this.sleeps++
    this.time += ms
  }
}
