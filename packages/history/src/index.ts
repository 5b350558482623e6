export { FileSnapshotLog } from "./adapters/file/file-snapshot-log"
export type { FileSnapshotLogConfig, FileSnapshotLogDeps } from "./adapters/file/file-snapshot-log"
export { openFileHistory } from "./adapters/file/open-file-history"
export type { FileHistoryDeps, FileHistoryOptions } from "./adapters/file/open-file-history"
export { MemorySnapshotLog } from "./adapters/memory/memory-snapshot-log"
export { ConfigHistory } from "./core/config-history"
export type {
  CommitOptions,
  ConfigHistoryDeps,
  ConfigHistoryOptions,
  PruneOptions,
  PruneResult,
  RepairResult,
} from "./core/config-history"
export { diffTrees } from "./core/diff-trees"
export { HistoryCorruptionError, PlaintextSecretError, SnapshotNotFoundError } from "./core/history-error"
export type { CorruptionReason } from "./core/history-error"
export { scanLog } from "./core/scan-log"
export type { LogScan } from "./core/scan-log"
export { decodeSnapshot, encodeSnapshot } from "./core/snapshot-codec"
export type { DecodeResult } from "./core/snapshot-codec"
export type { DeltaKind, FieldDelta, VersionSnapshot } from "./ports/snapshot"
export type { SnapshotLog } from "./ports/snapshot-log"
