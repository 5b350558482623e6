import { LockError } from "../lock-error"

export function assertValidTimeMs(value: number, name: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw LockError.invalidOption(name, value)
  }
}

/** Like `assertValidTimeMs`, but zero is rejected too. */
export function assertPositiveTimeMs(value: number, name: string): void {
  assertValidTimeMs(value, name)
  if (value === 0) throw LockError.invalidOption(name, value)
}
