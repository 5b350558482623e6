import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /** Human-readable output for terminals. Structured JSON otherwise. */
  prettify?: boolean

  /**
   * Paths in log entries whose values are replaced before writing,
   * e.g. `["key", "passphrase", "*.password"]`.
   */
  redact?: string[]
}
