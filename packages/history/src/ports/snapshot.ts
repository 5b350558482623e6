import type { ConfigMapping, ConfigValue } from "@tessera/config"

/** One committed configuration. Immutable once written. */
export type VersionSnapshot = {
  /** 1 for the first commit, then contiguous. */
  readonly seq: number
  /** SHA-256 hex of the canonical tree. */
  readonly hash: string
  /** ISO-8601 commit time. */
  readonly timestamp: string
  /** Sensitive fields are stored encrypted. */
  readonly tree: ConfigMapping
  readonly author?: string
  /** Names of the sources merged into `tree`, lowest precedence first. */
  readonly sources: readonly string[]
}

export type DeltaKind = "added" | "removed" | "changed"

export type FieldDelta = {
  /** Dotted path of the highest node that differs. */
  readonly path: string
  readonly kind: DeltaKind
  /** Absent for sensitive fields. */
  readonly before?: ConfigValue
  readonly after?: ConfigValue
  readonly sensitive?: true
}
