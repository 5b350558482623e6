import type { ConfigValue } from "../../ports/value"

/** Structural equality. Mapping key order is ignored, sequence order is not. */
export function valuesEqual(a: ConfigValue, b: ConfigValue): boolean {
  switch (a.kind) {
    case "null":
      return b.kind === "null"
    case "boolean":
    case "number":
    case "string":
      return b.kind === a.kind && b.value === a.value
    case "sequence":
      return (
        b.kind === "sequence" &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => {
          const other = b.items[i]
          return other !== undefined && valuesEqual(item, other)
        })
      )
    case "mapping":
      if (b.kind !== "mapping" || a.entries.size !== b.entries.size) return false
      for (const [key, item] of a.entries) {
        const other = b.entries.get(key)
        if (other === undefined || !valuesEqual(item, other)) return false
      }
      return true
  }
}
