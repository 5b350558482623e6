import type { ConfigMapping } from "./value"

/**
 * Somewhere configuration comes from: a file, the environment, an object.
 *
 * A source only loads. Placeholder resolution, merging and validation
 * happen downstream, in precedence order of the source list.
 */
export interface ConfigSource {
  /**
   * Used in provenance and conflict records, e.g. `"yaml:config/base.yaml"`,
   * `"env:APP_"`, `"object:overrides"`.
   */
  readonly name: string

  load(): Promise<ConfigMapping>
}
