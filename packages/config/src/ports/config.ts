import type { MergeConflict } from "./merge"
import type { FieldPath } from "./path"
import type { ConfigMapping, ConfigValue } from "./value"

/**
 * Loaded, merged and validated configuration.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   sources: [
 *     new FileSource({ file: "config/base.yaml", required: true }),
 *     new FileSource({ file: "config/local.toml", required: false }),
 *     new EnvSource({ prefix: "APP_" }),
 *   ],
 *   schema,
 * })
 *
 * config.get("db.port")     // { kind: "number", value: 5432 }
 * config.explain("db.host") // "env:APP_"
 * ```
 */
export interface IConfig {
  readonly value: ConfigMapping

  readonly conflicts: readonly MergeConflict[]

  get(path: string | FieldPath): ConfigValue | undefined

  /**
   * Source that supplied the value at `path`: a source name, `"default"`
   * for schema defaults, or `undefined` when nothing is there.
   */
  explain(path: string | FieldPath): string | undefined

  /** Sources that supplied at least one value, in precedence order. */
  sourcesUsed(): string[]

  /** Paths present in the sources but not declared by the schema. */
  unknownKeys(): string[]
}
