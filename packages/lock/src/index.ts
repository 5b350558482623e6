export { FileLock } from "./adapters/file/file-lock"
export type { FileLockConfig, FileLockDeps } from "./adapters/file/file-lock"
export { MemoryLock } from "./adapters/memory/memory-lock"
export type { MemoryLockConfig, MemoryLockDeps } from "./adapters/memory/memory-lock"
export { LockAbortedError, LockError, LockTimeoutError } from "./core/lock-error"
export type { LockErrorCode } from "./core/lock-error"
export { pollUntil } from "./core/polling/poll-until"
export type { PollOptions, PollUntilResult } from "./core/polling/poll-until"
export { tryWithLock, withLock } from "./core/with-lock"
export type { Lock, LockKey } from "./ports/lock"
export type { LockLease } from "./ports/lock-lease"
export type { AcquireOptions, LockConfig, LockTtl, TryAcquireOptions } from "./ports/options"
