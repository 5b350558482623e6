/**
 * Line-oriented durable storage for snapshot records.
 *
 * Implementations make every write atomic: after a crash the log holds
 * either the old lines or the new ones.
 */
export interface SnapshotLog {
  /** Human-readable location, used in errors and logs. */
  readonly location: string

  /** Every record line, oldest first. Empty when the log does not exist. */
  readLines(): Promise<string[]>

  append(line: string): Promise<void>

  /** Replace the whole log. */
  rewrite(lines: readonly string[]): Promise<void>

  /**
   * Keep `lines` somewhere outside the log for inspection.
   *
   * @returns where they were put
   */
  quarantine(lines: readonly string[]): Promise<string>
}
