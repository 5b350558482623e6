import type { ConfigMapping } from "./value"

export type MergeSource = {
  name: string
  value: ConfigMapping
}

/**
 * How sequences present in several sources combine.
 *
 * - `replace`: the highest-precedence sequence wins whole.
 * - `concat`: items are appended in precedence order.
 */
export type SequencePolicy = "replace" | "concat"

export type MergeOptions = {
  /** @default "replace" */
  sequences?: SequencePolicy
}

export type ConflictKind = "type_conflict" | "value_conflict"

export type MergeConflict = {
  /** Dotted path, e.g. `db.host`. */
  readonly path: string
  readonly kind: ConflictKind
  /** Every source that defined the path, lowest precedence first. */
  readonly sources: readonly string[]
  /** Source whose value was kept. */
  readonly winner: string
}

export type MergeResult = {
  readonly value: ConfigMapping
  readonly conflicts: readonly MergeConflict[]
  /** Dotted leaf path to the source that supplied it. */
  readonly provenance: ReadonlyMap<string, string>
  /** Names of the merged sources, lowest precedence first. */
  readonly sources: readonly string[]
}
