import { BaseError } from "@tessera/errors"

export type CorruptionReason = "malformed_record" | "hash_mismatch" | "sequence_gap" | "duplicate_sequence"

/** The log has a bad record. Reads stop here; commits repair and continue. */
export class HistoryCorruptionError extends BaseError<"history_corrupted"> {
  static at(location: string, line: number, reason: CorruptionReason, detail: string): HistoryCorruptionError {
    return new HistoryCorruptionError(`${location}: line ${line}: ${detail}`, {
      code: "history_corrupted",
      context: { location, line, reason },
    })
  }

  get line(): number {
    return Number(this.context.line)
  }

  get reason(): string {
    return String(this.context.reason)
  }
}

export class SnapshotNotFoundError extends BaseError<"snapshot_not_found"> {
  constructor(seq: number) {
    super(`No snapshot with sequence number ${seq}`, { code: "snapshot_not_found", context: { seq } })
  }
}

/** A sensitive field would be written in plaintext and no key is configured. */
export class PlaintextSecretError extends BaseError<"plaintext_secret"> {
  constructor(paths: readonly string[]) {
    super(`Refusing to commit unencrypted sensitive fields without a key: ${paths.join(", ")}`, {
      code: "plaintext_secret",
      context: { paths: [...paths] },
    })
  }
}
