import type { LockLease } from "./lock-lease"
import type { AcquireOptions, TryAcquireOptions } from "./options"

export type LockKey = string

export interface Lock {
  /**
   * Acquire `key`, waiting up to `timeoutMs` while another holder has it.
   *
   * @returns the lease, or `null` when the wait timed out or was aborted.
   */
  acquire(key: LockKey, opts: AcquireOptions): Promise<LockLease | null>

  /** Single attempt. `null` when `key` is currently held. */
  tryAcquire(key: LockKey, opts: TryAcquireOptions): Promise<LockLease | null>
}
