import type { Clock, Milliseconds } from "@tessera/clock"
import { assertPositiveTimeMs, assertValidTimeMs } from "../validation/validation"

export type PollUntilSuccess<T> = { ok: true; value: T }
export type PollUntilFailure = { ok: false; reason: "timeout" | "aborted" }
export type PollUntilResult<T> = PollUntilSuccess<T> | PollUntilFailure

export type PollOptions = {
  pollMs: Milliseconds
  timeoutMs: Milliseconds
  signal?: AbortSignal
}

export type PollDeps = {
  clock: Clock
}

/**
 * Call `fn` until it yields a non-null value, sleeping `pollMs` between
 * attempts on `deps.clock`. At least one attempt is made unless the signal
 * is already aborted.
 */
export async function pollUntil<T>(
  fn: () => Promise<T | null>,
  deps: PollDeps,
  opts: PollOptions,
): Promise<PollUntilResult<T>> {
  assertValidTimeMs(opts.timeoutMs, "timeoutMs")
  assertPositiveTimeMs(opts.pollMs, "pollMs")

  const deadline = deps.clock.nowMs() + opts.timeoutMs

  while (true) {
    if (opts.signal?.aborted) return { ok: false, reason: "aborted" }

    const result = await fn()
    if (result !== null) return { ok: true, value: result }

    const remaining = deadline - deps.clock.nowMs()
    if (remaining <= 0) return { ok: false, reason: "timeout" }

    await deps.clock.sleep(Math.min(opts.pollMs, remaining), opts.signal)
  }
}
