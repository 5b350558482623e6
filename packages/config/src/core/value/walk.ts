import type { FieldPath } from "../../ports/path"
import type { ConfigScalar, ConfigValue } from "../../ports/value"
import { mapping, sequence } from "./value"

/**
 * Rebuild `value`, replacing each scalar with `fn(scalar, path)`.
 * Subtrees whose leaves all come back unchanged are reused as they are.
 */
export function mapLeaves(
  value: ConfigValue,
  fn: (leaf: ConfigScalar, path: FieldPath) => ConfigValue,
  path: FieldPath = [],
): ConfigValue {
  switch (value.kind) {
    case "sequence": {
      let changed = false
      const items = value.items.map((item, i) => {
        const next = mapLeaves(item, fn, [...path, i])
        if (next !== item) changed = true
        return next
      })
      return changed ? sequence(items) : value
    }
    case "mapping": {
      let changed = false
      const entries: [string, ConfigValue][] = []
      for (const [key, item] of value.entries) {
        const next = mapLeaves(item, fn, [...path, key])
        if (next !== item) changed = true
        entries.push([key, next])
      }
      return changed ? mapping(entries) : value
    }
    default:
      return fn(value, path)
  }
}

/** Every node with its path, parents before children. */
export function* walk(value: ConfigValue, path: FieldPath = []): Generator<[FieldPath, ConfigValue]> {
  yield [path, value]
  if (value.kind === "sequence") {
    for (const [i, item] of value.items.entries()) yield* walk(item, [...path, i])
  } else if (value.kind === "mapping") {
    for (const [key, item] of value.entries) yield* walk(item, [...path, key])
  }
}
