import { createHash } from "node:crypto"
import type { ConfigValue } from "../../ports/value"

function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * Deterministic compact JSON: mapping keys sorted by UTF-16 code units,
 * sequences in order. Equal trees give equal strings whatever their key order.
 */
export function canonicalize(value: ConfigValue): string {
  switch (value.kind) {
    case "null":
      return "null"
    case "boolean":
    case "number":
    case "string":
      return JSON.stringify(value.value)
    case "sequence":
      return `[${value.items.map(canonicalize).join(",")}]`
    case "mapping": {
      const keys = [...value.entries.keys()].sort(compareKeys)
      const parts = keys.map((key) => {
        const item = value.entries.get(key)
        return item === undefined ? "" : `${JSON.stringify(key)}:${canonicalize(item)}`
      })
      return `{${parts.join(",")}}`
    }
  }
}

/** SHA-256 of the canonical form, lowercase hex. */
export function contentHash(value: ConfigValue): string {
  return createHash("sha256").update(canonicalize(value), "utf8").digest("hex")
}
