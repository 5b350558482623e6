import type { EnvLookup, EnvRecord } from "../../ports/env"

/**
 * Lookup over several records, first defined value wins. Only a record's
 * own keys count.
 *
 * @example
 * ```ts
 * const lookup = envLookup(process.env, await new DotenvSource({ file: ".env", required: false }).loadRecord())
 * ```
 */
export function envLookup(...records: EnvRecord[]): EnvLookup {
  return (name) => {
    for (const record of records) {
      if (!Object.hasOwn(record, name)) continue
      const value = record[name]
      if (value !== undefined) return value
    }
    return undefined
  }
}
