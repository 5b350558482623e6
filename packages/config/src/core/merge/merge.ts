import type { MergeConflict, MergeOptions, MergeResult, MergeSource, SequencePolicy } from "../../ports/merge"
import type { FieldPath } from "../../ports/path"
import type { ConfigMapping, ConfigValue } from "../../ports/value"
import { valuesEqual } from "../value/equality"
import { formatPath } from "../value/path"
import { mapping, sequence } from "../value/value"

type Contribution = { source: string; value: ConfigValue }

type ValueClass = "mapping" | "sequence" | "scalar"

function classOf(value: ConfigValue): ValueClass {
  return value.kind === "mapping" || value.kind === "sequence" ? value.kind : "scalar"
}

class MergeRun {
  readonly conflicts: MergeConflict[] = []
  readonly provenance = new Map<string, string>()

  constructor(private readonly sequences: SequencePolicy) {}

  node(path: FieldPath, contributions: readonly Contribution[]): ConfigValue {
    const top = contributions.at(-1)
    if (!top) throw new RangeError("merge needs at least one contribution")

    const topClass = classOf(top.value)
    let lastOther = -1
    contributions.forEach((c, i) => {
      if (classOf(c.value) !== topClass) lastOther = i
    })

    if (lastOther >= 0) this.conflict(path, "type_conflict", contributions, top)
    const sameClass = contributions.slice(lastOther + 1)

    switch (topClass) {
      case "mapping":
        return this.mappings(path, sameClass)
      case "sequence":
        if (this.sequences === "concat") return this.concat(path, sameClass, top)
        return this.leaf(path, sameClass, top, lastOther < 0)
      case "scalar":
        return this.leaf(path, sameClass, top, lastOther < 0)
    }
  }

  private mappings(path: FieldPath, contributions: readonly Contribution[]): ConfigMapping {
    const keys = new Set<string>()
    for (const { value } of contributions) {
      if (value.kind === "mapping") for (const key of value.entries.keys()) keys.add(key)
    }

    if (keys.size === 0) {
      const top = contributions.at(-1)
      if (top && path.length > 0) this.provenance.set(formatPath(path), top.source)
      return mapping()
    }

    const entries: [string, ConfigValue][] = []
    for (const key of keys) {
      const below: Contribution[] = []
      for (const { source, value } of contributions) {
        const item = value.kind === "mapping" ? value.entries.get(key) : undefined
        if (item !== undefined) below.push({ source, value: item })
      }
      entries.push([key, this.node([...path, key], below)])
    }
    return mapping(entries)
  }

  private leaf(
    path: FieldPath,
    contributions: readonly Contribution[],
    top: Contribution,
    checkValues: boolean,
  ): ConfigValue {
    if (checkValues && contributions.some((c) => !valuesEqual(c.value, top.value))) {
      this.conflict(path, "value_conflict", contributions, top)
    }
    this.provenance.set(formatPath(path), top.source)
    return top.value
  }

  private concat(path: FieldPath, contributions: readonly Contribution[], top: Contribution): ConfigValue {
    const items = contributions.flatMap(({ value }) => (value.kind === "sequence" ? value.items : []))
    this.provenance.set(formatPath(path), top.source)
    return sequence(items)
  }

  private conflict(
    path: FieldPath,
    kind: MergeConflict["kind"],
    contributions: readonly Contribution[],
    top: Contribution,
  ): void {
    this.conflicts.push(
      Object.freeze({
        path: formatPath(path),
        kind,
        sources: Object.freeze(contributions.map((c) => c.source)),
        winner: top.source,
      }),
    )
  }
}

/**
 * Merge trees listed lowest precedence first.
 *
 * Mappings merge key by key, keeping first-seen key order. At any other
 * path the highest-precedence value wins: sequences whole (or concatenated
 * under `sequences: "concat"`), scalars as they are. A path defined with
 * different kinds is a `type_conflict`; a scalar or sequence defined with
 * different values is a `value_conflict`.
 *
 * @example
 * ```ts
 * const { value, conflicts } = merge([
 *   { name: "base", value: base },
 *   { name: "env", value: fromEnv },
 * ])
 * // conflicts: [{ path: "db.host", kind: "value_conflict", sources: ["base", "env"], winner: "env" }]
 * ```
 */
export function merge(sources: readonly MergeSource[], options: MergeOptions = {}): MergeResult {
  const run = new MergeRun(options.sequences ?? "replace")
  const names = sources.map((s) => s.name)

  const value =
    sources.length === 0
      ? mapping()
      : run.node(
          [],
          sources.map(({ name, value }) => ({ source: name, value })),
        )

  return {
    value: value.kind === "mapping" ? value : mapping(),
    conflicts: run.conflicts,
    provenance: run.provenance,
    sources: names,
  }
}
