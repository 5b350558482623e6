import type { Milliseconds } from "@tessera/clock"
import { BaseError } from "@tessera/errors"

export type LockErrorCode = "lock_timeout" | "lock_aborted" | "invalid_lock_option"

export class LockError extends BaseError<LockErrorCode> {
  static invalidOption(name: string, value: number): LockError {
    return new LockError(`${name} must be a finite, non-negative number, got: ${value}`, {
      code: "invalid_lock_option",
      context: { option: name, value },
      isOperational: false,
    })
  }
}

/** Raised by `withLock` when the lease could not be obtained within the wait. */
export class LockTimeoutError extends LockError {
  constructor(key: string, timeoutMs: Milliseconds | undefined) {
    super(
      timeoutMs === undefined
        ? `Timed out waiting for lock "${key}"`
        : `Timed out after ${timeoutMs}ms waiting for lock "${key}"`,
      {
        code: "lock_timeout",
        context: { key, ...(timeoutMs !== undefined && { timeoutMs }) },
        isRetryable: true,
      },
    )
  }
}

export class LockAbortedError extends LockError {
  constructor(key: string) {
    super(`Lock acquisition for "${key}" was aborted`, {
      code: "lock_aborted",
      context: { key },
    })
  }
}
