import { randomUUID } from "node:crypto"
import { mkdir, rm } from "node:fs/promises"
import path from "node:path"
import type { Clock, Milliseconds } from "@tessera/clock"
import { type Logger, NullLogger } from "@tessera/logger"
import { pollUntil } from "../../core/polling/poll-until"
import { assertPositiveTimeMs, assertValidTimeMs } from "../../core/validation/validation"
import type { Lock, LockKey } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"
import type { AcquireOptions, LockConfig, TryAcquireOptions } from "../../ports/options"
import { FileLease } from "./file-lock-lease"
import {
  claimTakeover,
  createLockFile,
  type LockFileState,
  type LockRecord,
  modifiedAtMs,
  readLockFile,
  takeoverPathFor,
} from "./lock-file"

function sameHolder(a: LockFileState, b: LockFileState): boolean {
  if (a.state === "held" && b.state === "held") return a.record.owner === b.record.owner
  if (a.state === "unreadable" && b.state === "unreadable") return a.modifiedAtMs === b.modifiedAtMs
  return a.state === b.state
}

export type FileLockDeps = {
  clock: Clock
  logger?: Logger
}

export type FileLockConfig = LockConfig & {
  /** Directory holding one `<key>.lock` file per held key. */
  directory: string

  /**
   * Age after which a lock file that cannot be parsed counts as abandoned.
   * @default 10_000
   */
  unreadableGraceMs?: Milliseconds
}

/**
 * Cross-process lock backed by exclusively created files.
 *
 * A lease is a JSON record `{owner, key, pid, expiresAt}`; a record whose
 * `expiresAt` has passed is stale and may be taken over. A takeover first
 * claims `<key>.lock.takeover` with `O_EXCL`, re-reads the lock file under
 * that claim and only removes it if it still holds the record that was
 * found stale, then re-creates it with `O_EXCL`. A claim left behind by a
 * crashed waiter is dropped after `unreadableGraceMs`.
 */
export class FileLock implements Lock {
  private readonly logger: Logger
  private readonly unreadableGraceMs: Milliseconds

  constructor(
    private readonly deps: FileLockDeps,
    private readonly config: FileLockConfig,
  ) {
    this.logger = (deps.logger ?? new NullLogger()).child({ module: "file-lock" })
    this.unreadableGraceMs = config.unreadableGraceMs ?? 10_000
  }

  /** Path of the lock file guarding `key`. */
  pathFor(key: LockKey): string {
    return path.join(this.config.directory, `${encodeURIComponent(key)}.lock`)
  }

  async acquire(key: LockKey, opts: AcquireOptions): Promise<LockLease | null> {
    if (opts.signal?.aborted) return null

    const timeoutMs = opts.timeoutMs ?? this.config.defaultTimeoutMs
    assertValidTimeMs(timeoutMs, "timeoutMs")

    const startedAt = this.deps.clock.nowMs()
    const acquired = await pollUntil(
      () => this.tryAcquire(key, { ttl: opts.ttl }),
      { clock: this.deps.clock },
      {
        pollMs: this.config.pollMs,
        timeoutMs,
        ...(opts.signal && { signal: opts.signal }),
      },
    )

    const waitedMs = this.deps.clock.nowMs() - startedAt
    if (!acquired.ok) {
      this.logger.warn("lock not acquired", { lockKey: key, reason: acquired.reason, durationMs: waitedMs })
      return null
    }
    if (waitedMs > 0) this.logger.debug("lock acquired after waiting", { lockKey: key, durationMs: waitedMs })
    return acquired.value
  }

  async tryAcquire(key: LockKey, opts: TryAcquireOptions): Promise<LockLease | null> {
    assertPositiveTimeMs(opts.ttl.milliseconds, `ttl for lock ${key}`)
    await mkdir(this.config.directory, { recursive: true })

    const file = this.pathFor(key)
    const record: LockRecord = {
      owner: randomUUID(),
      key,
      pid: process.pid,
      expiresAt: this.deps.clock.nowMs() + opts.ttl.milliseconds,
    }

    if (await createLockFile(file, record)) return this.lease(key, file, record)

    const current = await readLockFile(file)
    if (!this.isAbandoned(current)) return null

    return this.takeOver(key, file, current, record)
  }

  private async takeOver(
    key: LockKey,
    file: string,
    observed: LockFileState,
    record: LockRecord,
  ): Promise<LockLease | null> {
    const claim = takeoverPathFor(file)
    if (!(await claimTakeover(file, record))) {
      await this.dropAbandonedClaim(claim)
      return null
    }

    try {
      const current = await readLockFile(file)
      if (!sameHolder(observed, current) || !this.isAbandoned(current)) return null

      if (current.state !== "missing") {
        this.logger.warn("taking over abandoned lock file", {
          lockKey: key,
          ...(current.state === "held" && { previousPid: current.record.pid }),
        })
        await rm(file, { force: true })
      }
      return (await createLockFile(file, record)) ? this.lease(key, file, record) : null
    } finally {
      await rm(claim, { force: true })
    }
  }

  private async dropAbandonedClaim(claim: string): Promise<void> {
    const modified = await modifiedAtMs(claim)
    if (modified === null || this.deps.clock.nowMs() - modified <= this.unreadableGraceMs) return

    this.logger.warn("dropping abandoned takeover claim", { path: claim })
    await rm(claim, { force: true })
  }

  private isAbandoned(current: LockFileState): boolean {
    const now = this.deps.clock.nowMs()
    switch (current.state) {
      case "missing":
        return true
      case "held":
        return current.record.expiresAt <= now
      case "unreadable":
        return now - current.modifiedAtMs > this.unreadableGraceMs
    }
  }

  private lease(key: LockKey, file: string, record: LockRecord): LockLease {
    return new FileLease(key, file, record, { clock: this.deps.clock })
  }
}
