import { rm } from "node:fs/promises"
import type { Clock } from "@tessera/clock"
import { assertPositiveTimeMs } from "../../core/validation/validation"
import type { LockKey } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"
import type { LockTtl } from "../../ports/options"
import { type LockRecord, readLockFile, replaceLockFile } from "./lock-file"

export type FileLeaseDeps = {
  clock: Clock
}

export class FileLease implements LockLease {
  private released = false

  constructor(
    readonly key: LockKey,
    private readonly file: string,
    private readonly record: LockRecord,
    private readonly deps: FileLeaseDeps,
  ) {}

  /** Removes the lock file, unless it now belongs to someone else. */
  async release(): Promise<void> {
    if (this.released) return
    this.released = true

    if (await this.stillOwned()) {
      await rm(this.file, { force: true })
    }
  }

  async extend(ttl: LockTtl): Promise<boolean> {
    if (this.released) return false
    assertPositiveTimeMs(ttl.milliseconds, `ttl for lock ${this.key}`)

    if (!(await this.stillOwned())) {
      this.released = true
      return false
    }

    await replaceLockFile(this.file, {
      ...this.record,
      expiresAt: this.deps.clock.nowMs() + ttl.milliseconds,
    })
    return true
  }

  private async stillOwned(): Promise<boolean> {
    const current = await readLockFile(this.file)
    return current.state === "held" && current.record.owner === this.record.owner
  }
}
