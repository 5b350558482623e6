import type { LockKey } from "./lock"
import type { LockTtl } from "./options"

export interface LockLease {
  readonly key: LockKey

  /** Release if still owned. Safe to call more than once. */
  release(): Promise<void>

  /**
   * Push the expiry `ttl` into the future.
   *
   * @returns `false` once the lease was released or taken over after expiring.
   */
  extend(ttl: LockTtl): Promise<boolean>
}
