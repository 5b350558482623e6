import type { AppError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && Number.isFinite(v.valueOf())
}

/** Structural check, so errors from another copy of this package still match. */
export function isAppError(e: unknown): e is AppError {
  if (!(e instanceof Error) || !isRecord(e)) return false

  return (
    typeof e.code === "string" &&
    isRecord(e.context) &&
    typeof e.isRetryable === "boolean" &&
    typeof e.isOperational === "boolean" &&
    isValidDate(e.timestamp)
  )
}

/** Narrow to an AppError carrying one of `codes`. */
export function hasErrorCode<C extends string>(
  e: unknown,
  ...codes: readonly C[]
): e is AppError & { readonly code: C } {
  if (!isAppError(e)) return false
  const code: string = e.code
  return codes.some((c) => c === code)
}
