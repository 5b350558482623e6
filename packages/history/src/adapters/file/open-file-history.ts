import path from "node:path"
import type { Clock, Milliseconds } from "@tessera/clock"
import { FileLock } from "@tessera/lock"
import type { Logger } from "@tessera/logger"
import { ConfigHistory, type ConfigHistoryOptions } from "../../core/config-history"
import { FileSnapshotLog } from "./file-snapshot-log"

export type FileHistoryDeps = {
  clock: Clock
  logger?: Logger
}

export type FileHistoryOptions = Omit<ConfigHistoryOptions, "lockKey" | "lockTimeoutMs"> & {
  /** JSON Lines history file. Its lock is `<file>.lock` beside it. */
  file: string
  lockTimeoutMs: Milliseconds
  /** @default 50 */
  lockPollMs?: Milliseconds
}

/** History in a file, guarded by a lock file next to it. */
export function openFileHistory(deps: FileHistoryDeps, options: FileHistoryOptions): ConfigHistory {
  const { file, lockTimeoutMs, lockPollMs, ...rest } = options
  const resolved = path.resolve(file)

  const lock = new FileLock(
    { clock: deps.clock, ...(deps.logger && { logger: deps.logger }) },
    { directory: path.dirname(resolved), defaultTimeoutMs: lockTimeoutMs, pollMs: lockPollMs ?? 50 },
  )

  return new ConfigHistory(
    {
      log: new FileSnapshotLog({ clock: deps.clock }, { file: resolved }),
      lock,
      clock: deps.clock,
      ...(deps.logger && { logger: deps.logger }),
    },
    { ...rest, lockKey: path.basename(resolved), lockTimeoutMs },
  )
}
