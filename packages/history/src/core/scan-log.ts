import type { VersionSnapshot } from "../ports/snapshot"
import { HistoryCorruptionError } from "./history-error"
import { decodeSnapshot } from "./snapshot-codec"

export type LogScan = {
  /** Longest run of good records from the start of the log. */
  readonly intact: readonly VersionSnapshot[]
  /** Lines after the intact prefix, starting with the first bad one. */
  readonly tail: readonly string[]
  /** Why the tail was cut, when there is one. */
  readonly corruption?: HistoryCorruptionError
}

/**
 * Split log lines into the intact prefix and everything after the first bad
 * record. A record is bad when it does not parse, its hash does not match its
 * tree, or its sequence number is not one more than the previous one. The
 * first record may start above 1 once older snapshots have been pruned.
 */
export function scanLog(location: string, lines: readonly string[]): LogScan {
  const intact: VersionSnapshot[] = []

  for (const [index, line] of lines.entries()) {
    const lineNo = index + 1
    const cut = (corruption: HistoryCorruptionError): LogScan => ({ intact, tail: lines.slice(index), corruption })

    const decoded = decodeSnapshot(line)
    if (!decoded.ok) return cut(HistoryCorruptionError.at(location, lineNo, decoded.reason, decoded.detail))

    const previous = intact.at(-1)
    const { seq } = decoded.snapshot
    const expected = previous ? previous.seq + 1 : seq
    if (seq !== expected) {
      const reason = seq < expected ? "duplicate_sequence" : "sequence_gap"
      const what = seq < expected ? "repeats or goes back to" : "skips to"
      return cut(HistoryCorruptionError.at(location, lineNo, reason, `sequence ${what} ${seq}, expected ${expected}`))
    }

    intact.push(decoded.snapshot)
  }

  return { intact, tail: [] }
}
