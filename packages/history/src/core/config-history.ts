import type { Clock, Milliseconds } from "@tessera/clock"
import {
  applyDefaults,
  type ConfigMapping,
  contentHash,
  type FieldPath,
  type MergeResult,
  type Schema,
  validate,
  ValidationFailedError,
} from "@tessera/config"
import { type Lock, type LockKey, LockTimeoutError, withLock } from "@tessera/lock"
import { createNullLogger, type Logger } from "@tessera/logger"
import { encryptFields, plaintextSecrets, type SensitiveMarker } from "@tessera/vault"
import type { FieldDelta, VersionSnapshot } from "../ports/snapshot"
import type { SnapshotLog } from "../ports/snapshot-log"
import { diffTrees } from "./diff-trees"
import { PlaintextSecretError, SnapshotNotFoundError } from "./history-error"
import { scanLog } from "./scan-log"
import { encodeSnapshot } from "./snapshot-codec"

export type ConfigHistoryDeps = {
  log: SnapshotLog
  lock: Lock
  clock: Clock
  logger?: Logger
}

export type ConfigHistoryOptions = {
  /** Key guarding the log in `deps.lock`. */
  lockKey: LockKey
  /** How long a commit may hold the lock. */
  lockTtlMs: Milliseconds
  /** Wait for the lock before failing with `LockTimeoutError`. Default: the lock's own default. */
  lockTimeoutMs?: Milliseconds
  /** Commits must satisfy it. Defaults are filled in before validation. */
  schema?: Schema
  /** Reject keys the schema does not declare. Default: `schema.strict` */
  strict?: boolean
  /** Fields stored encrypted. */
  sensitive?: SensitiveMarker
  /** 32-byte key for sensitive fields. Without one, commits holding plaintext secrets are refused. */
  encryptionKey?: Buffer
}

export type CommitOptions = {
  author?: string
}

export type PruneOptions = {
  /** Snapshots to keep, newest first. At least 1. */
  keepLatest: number
}

export type PruneResult = {
  removed: number
  kept: number
}

export type RepairResult = {
  /** Where the corrupt lines went. */
  quarantinedTo: string
  /** Corrupt lines moved out of the log. */
  removed: number
  /** Intact snapshots left in the log. */
  kept: number
}

/**
 * Append-only store of committed configurations.
 *
 * Writes (`commit`, `prune`, `repair`) hold the store lock. Reads re-read the
 * log each time and fail with `HistoryCorruptionError` when it has a bad
 * record; `commit` instead repairs the log and continues after the last
 * intact snapshot.
 */
export class ConfigHistory {
  private readonly logger: Logger

  constructor(
    private readonly deps: ConfigHistoryDeps,
    private readonly options: ConfigHistoryOptions,
  ) {
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "history", lockKey: options.lockKey })
  }

  /**
   * Validate, encrypt sensitive fields and append `merged` as the next
   * snapshot.
   *
   * @throws ValidationFailedError when the tree does not satisfy the schema
   * @throws PlaintextSecretError when sensitive fields are set and no key is configured
   * @throws LockTimeoutError
   */
  async commit(merged: MergeResult, opts: CommitOptions = {}): Promise<VersionSnapshot> {
    return this.locked("commit", async () => {
      const tree = this.sealed(this.checked(merged.value))
      const intact = await this.repairLocked()

      const snapshot: VersionSnapshot = Object.freeze({
        seq: (intact.at(-1)?.seq ?? 0) + 1,
        hash: contentHash(tree),
        timestamp: this.deps.clock.now().toISOString(),
        tree,
        sources: Object.freeze([...merged.sources]),
        ...(opts.author !== undefined && { author: opts.author }),
      })

      await this.deps.log.append(encodeSnapshot(snapshot))
      this.logger.info("snapshot committed", {
        operation: "commit",
        seq: snapshot.seq,
        hash: snapshot.hash,
        sources: snapshot.sources.length,
        ...(snapshot.author !== undefined && { author: snapshot.author }),
      })
      return snapshot
    })
  }

  /**
   * Every snapshot, newest first. Each iteration reads the log again, so
   * the same iterable can be walked more than once and sees later commits.
   *
   * @throws HistoryCorruptionError when iteration starts
   */
  history(): AsyncIterable<VersionSnapshot> {
    return {
      [Symbol.asyncIterator]: () => this.newestFirst(),
    }
  }

  private async *newestFirst(): AsyncGenerator<VersionSnapshot> {
    const snapshots = await this.readIntact()
    for (let i = snapshots.length - 1; i >= 0; i--) {
      const snapshot = snapshots[i]
      if (snapshot) yield snapshot
    }
  }

  /** @throws SnapshotNotFoundError, HistoryCorruptionError */
  async get(seq: number): Promise<VersionSnapshot> {
    const found = (await this.readIntact()).find((s) => s.seq === seq)
    if (!found) throw new SnapshotNotFoundError(seq)
    return found
  }

  /** `null` when nothing has been committed. */
  async latest(): Promise<VersionSnapshot | null> {
    return (await this.readIntact()).at(-1) ?? null
  }

  async diff(fromSeq: number, toSeq: number): Promise<FieldDelta[]> {
    const snapshots = await this.readIntact()
    const find = (seq: number) => {
      const found = snapshots.find((s) => s.seq === seq)
      if (!found) throw new SnapshotNotFoundError(seq)
      return found
    }
    return diffTrees(find(fromSeq).tree, find(toSeq).tree, this.options.sensitive)
  }

  /** Tree of snapshot `seq`, sensitive fields still encrypted. Commits nothing. */
  async rollback(seq: number): Promise<ConfigMapping> {
    const snapshot = await this.get(seq)
    this.logger.info("rollback target read", { operation: "rollback", seq, hash: snapshot.hash })
    return snapshot.tree
  }

  /**
   * Drop all but the newest `keepLatest` snapshots. Sequence numbers of the
   * kept snapshots do not change.
   *
   * @throws HistoryCorruptionError, LockTimeoutError
   */
  async prune(opts: PruneOptions): Promise<PruneResult> {
    if (!Number.isInteger(opts.keepLatest) || opts.keepLatest < 1) {
      throw new RangeError(`keepLatest must be a positive integer, got ${opts.keepLatest}`)
    }

    return this.locked("prune", async () => {
      const snapshots = await this.readIntact()
      const keep = snapshots.slice(-opts.keepLatest)
      const removed = snapshots.length - keep.length
      if (removed === 0) return { removed, kept: keep.length }

      await this.deps.log.rewrite(keep.map(encodeSnapshot))
      this.logger.info("snapshots pruned", {
        operation: "prune",
        removed,
        kept: keep.length,
        ...(keep[0] && { oldestSeq: keep[0].seq }),
      })
      return { removed, kept: keep.length }
    })
  }

  /**
   * Move everything from the first bad record on into a quarantine file.
   *
   * @returns `null` when the log was intact
   */
  async repair(): Promise<RepairResult | null> {
    return this.locked("repair", async () => {
      const { location } = this.deps.log
      const scan = scanLog(location, await this.deps.log.readLines())
      if (!scan.corruption) return null
      return this.quarantine(scan.intact, scan.tail, scan.corruption.message)
    })
  }

  private async readIntact(): Promise<readonly VersionSnapshot[]> {
    const scan = scanLog(this.deps.log.location, await this.deps.log.readLines())
    if (scan.corruption) throw scan.corruption
    return scan.intact
  }

  private async repairLocked(): Promise<readonly VersionSnapshot[]> {
    const scan = scanLog(this.deps.log.location, await this.deps.log.readLines())
    if (scan.corruption) await this.quarantine(scan.intact, scan.tail, scan.corruption.message)
    return scan.intact
  }

  private async quarantine(
    intact: readonly VersionSnapshot[],
    tail: readonly string[],
    reason: string,
  ): Promise<RepairResult> {
    const quarantinedTo = await this.deps.log.quarantine(tail)
    await this.deps.log.rewrite(intact.map(encodeSnapshot))
    this.logger.warn("corrupt history quarantined", {
      operation: "repair",
      reason,
      removed: tail.length,
      kept: intact.length,
      quarantinedTo,
    })
    return { quarantinedTo, removed: tail.length, kept: intact.length }
  }

  private checked(value: ConfigMapping): ConfigMapping {
    const { schema } = this.options
    if (!schema) return value

    const { value: filled } = applyDefaults(value, schema)
    const { sensitive } = this.options
    const result = validate(filled, schema, {
      ...(this.options.strict !== undefined && { strict: this.options.strict }),
      ...(sensitive && { isSensitive: (path: FieldPath) => sensitive.matches(path) }),
    })
    if (!result.ok) {
      this.logger.warn("commit rejected", { operation: "commit", errors: result.errors.length })
      throw new ValidationFailedError(result.errors)
    }
    return filled
  }

  private sealed(value: ConfigMapping): ConfigMapping {
    const { sensitive, encryptionKey } = this.options
    if (!sensitive) return value
    if (encryptionKey) return encryptFields(value, sensitive, encryptionKey)

    const exposed = plaintextSecrets(value, sensitive)
    if (exposed.length > 0) throw new PlaintextSecretError(exposed)
    return value
  }

  private async locked<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withLock(this.deps.lock, this.options.lockKey, fn, {
        ttl: { milliseconds: this.options.lockTtlMs },
        ...(this.options.lockTimeoutMs !== undefined && { timeoutMs: this.options.lockTimeoutMs }),
      })
    } catch (err) {
      if (err instanceof LockTimeoutError) this.logger.warn("history lock not acquired", { operation, err })
      throw err
    }
  }
}
