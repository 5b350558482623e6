import type { IConfig } from "../../ports/config"
import type { MergeConflict, MergeResult } from "../../ports/merge"
import type { FieldPath } from "../../ports/path"
import type { ConfigMapping, ConfigValue } from "../../ports/value"
import { formatPath, getAtPath, toFieldPath } from "../value/path"

/** Provenance label for values filled in from schema defaults. */
export const DEFAULT_SOURCE = "default"

export type ConfigInit = {
  value: ConfigMapping
  merge: MergeResult
  /** Dotted paths filled from schema defaults. */
  defaults?: readonly string[]
  unknownKeys?: readonly string[]
}

export class Config implements IConfig {
  readonly value: ConfigMapping
  readonly conflicts: readonly MergeConflict[]
  private readonly provenance: ReadonlyMap<string, string>
  private readonly sources: readonly string[]
  private readonly unknown: readonly string[]

  constructor(init: ConfigInit) {
    const provenance = new Map(init.merge.provenance)
    for (const path of init.defaults ?? []) {
      for (const key of provenance.keys()) {
        if (isWithin(key, path)) provenance.delete(key)
      }
      provenance.set(path, DEFAULT_SOURCE)
    }

    this.value = init.value
    this.conflicts = init.merge.conflicts
    this.provenance = provenance
    this.sources = init.merge.sources
    this.unknown = init.unknownKeys ?? []
  }

  get(path: string | FieldPath): ConfigValue | undefined {
    return getAtPath(this.value, path)
  }

  /**
   * For a leaf, the source that supplied it. For a mapping, the
   * highest-precedence source among its leaves.
   */
  explain(path: string | FieldPath): string | undefined {
    const key = formatPath(toFieldPath(path))
    const exact = this.provenance.get(key)
    if (exact !== undefined) return exact

    let best: string | undefined
    for (const [leaf, source] of this.provenance) {
      if (isWithin(leaf, key) && this.rank(source) > this.rank(best)) best = source
    }
    return best
  }

  sourcesUsed(): string[] {
    const used = new Set(this.provenance.values())
    return this.sources.filter((name) => used.has(name))
  }

  unknownKeys(): string[] {
    return [...this.unknown]
  }

  private rank(source: string | undefined): number {
    if (source === undefined) return -2
    if (source === DEFAULT_SOURCE) return -1
    return this.sources.indexOf(source)
  }
}

/** Whether dotted `path` is `ancestor` or lies below it. */
function isWithin(path: string, ancestor: string): boolean {
  if (ancestor === "") return true
  if (!path.startsWith(ancestor)) return false
  const next = path.charAt(ancestor.length)
  return next === "" || next === "." || next === "["
}
