export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error: field paths, source names, sequence
 * numbers. Never configuration values that may be secret.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` when trying again (for example after a lock is released) may succeed. */
  readonly isRetryable: boolean

  /**
   * `true` for expected failures caused by input or environment: a malformed
   * file, a missing variable, a lock timeout. `false` for broken invariants.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/** JSON-safe error shape for logs and CLI output. */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
