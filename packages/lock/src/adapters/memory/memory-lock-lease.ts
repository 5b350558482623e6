import type { LockKey } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"
import type { LockTtl } from "../../ports/options"
import { assertPositiveTimeMs } from "../../core/validation/validation"

export type MemoryLeaseDeps = {
  onRelease: () => void
}

export type MemoryLeaseOpts = {
  ttl: LockTtl
}

/** Lease held in process memory; a timer releases it once the TTL lapses. */
export class MemoryLease implements LockLease {
  private released = false
  private ttlTimer: NodeJS.Timeout | null = null

  constructor(
    readonly key: LockKey,
    private readonly deps: MemoryLeaseDeps,
    opts: MemoryLeaseOpts,
  ) {
    this.armWatchdog(opts.ttl)
  }

  async release(): Promise<void> {
    this.releaseNow()
  }

  async extend(ttl: LockTtl): Promise<boolean> {
    if (this.released) return false

    this.clearWatchdog()
    this.armWatchdog(ttl)
    return true
  }

  private releaseNow(): void {
    if (this.released) return

    this.released = true
    this.clearWatchdog()
    this.deps.onRelease()
  }

  private armWatchdog(ttl: LockTtl): void {
    assertPositiveTimeMs(ttl.milliseconds, `ttl for lock ${this.key}`)

    this.ttlTimer = setTimeout(() => this.releaseNow(), ttl.milliseconds)
    this.ttlTimer.unref()
  }

  private clearWatchdog(): void {
    if (!this.ttlTimer) return

    clearTimeout(this.ttlTimer)
    this.ttlTimer = null
  }
}
