import type { EnvLookup } from "../../ports/env"
import type { ConfigMapping, ConfigValue } from "../../ports/value"
import { UnresolvedReferenceError } from "../errors"
import { mapLeaves } from "../value/walk"
import { configString } from "../value/value"

const PLACEHOLDER = /\$\$\{|\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g

export type ResolveEnvOptions = {
  /** Source name prefixed to error messages. */
  origin?: string
}

/**
 * Substitute `${NAME}` and `${NAME:-default}` in string values. The default
 * applies when NAME is unset or empty; `$${` is a literal `${`. Keys and
 * non-string values are left alone, and substituted text is not scanned again.
 *
 * @throws UnresolvedReferenceError for a variable that is unset and has no default
 */
export function resolveEnv(value: ConfigMapping, lookup: EnvLookup, options?: ResolveEnvOptions): ConfigMapping
export function resolveEnv(value: ConfigValue, lookup: EnvLookup, options?: ResolveEnvOptions): ConfigValue
export function resolveEnv(value: ConfigValue, lookup: EnvLookup, options: ResolveEnvOptions = {}): ConfigValue {
  return mapLeaves(value, (leaf, path) => {
    if (leaf.kind !== "string" || !leaf.value.includes("${")) return leaf

    const resolved = leaf.value.replace(PLACEHOLDER, (match, name: string | undefined, fallback: string | undefined) => {
      if (name === undefined) return "${"

      const found = lookup(name)
      if (found !== undefined && found !== "") return found
      if (fallback !== undefined) return fallback
      if (found !== undefined) return found

      throw new UnresolvedReferenceError(path, name, options.origin)
    })

    return resolved === leaf.value ? leaf : configString(resolved)
  })
}
