import { type FieldPath, formatPath, matchesPattern, parsePath, type PathSegment } from "@tessera/config"
import type { SensitiveMarker } from "../ports/sensitive"

export type SensitiveFieldsOptions = {
  /** Dotted paths, `*` matching any single key or index, e.g. `services.*.password`. */
  paths?: readonly string[]
  /** Key-name endings that mark a field wherever it is. Default: `["_secret"]` */
  suffixes?: readonly string[]
}

export const DEFAULT_SENSITIVE_SUFFIXES = ["_secret"] as const

/**
 * @example
 * ```ts
 * const markers = new SensitiveFields({ paths: ["db.password"], suffixes: ["_secret", "_token"] })
 * markers.matches(["api", "token_secret"]) // true
 * ```
 */
export class SensitiveFields implements SensitiveMarker {
  private readonly patterns: readonly PathSegment[][]
  private readonly suffixes: readonly string[]

  constructor(options: SensitiveFieldsOptions = {}) {
    this.patterns = (options.paths ?? []).map((p) => parsePath(p))
    this.suffixes = options.suffixes ?? DEFAULT_SENSITIVE_SUFFIXES
  }

  matches(path: FieldPath): boolean {
    const last = path.at(-1)
    if (typeof last === "string" && this.suffixes.some((suffix) => last.endsWith(suffix))) return true
    return this.patterns.some((pattern) => matchesPattern(path, pattern))
  }

  /** Dotted form of the configured paths, for logs and error context. */
  describe(): string[] {
    return [...this.patterns.map(formatPath), ...this.suffixes.map((s) => `*${s}`)]
  }
}
