import type { Lock, LockKey } from "../ports/lock"
import type { AcquireOptions, TryAcquireOptions } from "../ports/options"
import { LockAbortedError, LockTimeoutError } from "./lock-error"

/** Run `fn` only if `key` is free right now. `null` when it was held. */
export async function tryWithLock<T>(
  lock: Lock,
  key: LockKey,
  fn: () => Promise<T>,
  opts: TryAcquireOptions,
): Promise<T | null> {
  const lease = await lock.tryAcquire(key, opts)
  if (!lease) return null

  try {
    return await fn()
  } finally {
    await lease.release()
  }
}

/**
 * Run `fn` while holding `key`, releasing afterwards even when `fn` throws.
 *
 * @throws LockTimeoutError when the lease is not obtained within the wait
 * @throws LockAbortedError when `opts.signal` aborts first
 */
export async function withLock<T>(
  lock: Lock,
  key: LockKey,
  fn: () => Promise<T>,
  opts: AcquireOptions,
): Promise<T> {
  if (opts.signal?.aborted) throw new LockAbortedError(key)

  const lease = await lock.acquire(key, opts)
  if (!lease) {
    if (opts.signal?.aborted) throw new LockAbortedError(key)
    throw new LockTimeoutError(key, opts.timeoutMs)
  }

  try {
    return await fn()
  } finally {
    await lease.release()
  }
}
