import type { Milliseconds } from "@tessera/clock"

export type LockTtl = { milliseconds: Milliseconds }

export type AcquireOptions = {
  /** How long the lease stays valid without `extend()`. */
  ttl: LockTtl

  /** Max wait for acquisition. Falls back to `LockConfig.defaultTimeoutMs`. */
  timeoutMs?: Milliseconds

  /** Ends the wait early. No effect once the lease is held. */
  signal?: AbortSignal
}

export type TryAcquireOptions = {
  ttl: LockTtl
}

export type LockConfig = {
  /** Wait used by `acquire()` when `timeoutMs` is omitted. */
  defaultTimeoutMs: Milliseconds

  /** Interval between attempts while waiting. */
  pollMs: Milliseconds
}
