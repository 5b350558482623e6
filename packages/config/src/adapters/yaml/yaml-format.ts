import { parseDocument, stringify } from "yaml"
import type { FormatAdapter } from "../../ports/format-adapter"
import type { ConfigMapping } from "../../ports/value"
import { ParseError } from "../../core/errors"
import { locate } from "../../core/format/locate"
import { toOrdered } from "../../core/value/plain"

/**
 * Lossless for the values a ConfigValue can hold, key order included.
 * Duplicate keys are syntax errors and an empty document decodes to an
 * empty mapping. Scalar keys such as `1` or `true` become strings.
 */
export class YamlFormat implements FormatAdapter {
  readonly format = "yaml"
  readonly extensions = [".yaml", ".yml"]

  decode(text: string, origin: string): unknown {
    const doc = parseDocument(text, { uniqueKeys: true, prettyErrors: false })
    const [error] = doc.errors

    if (error) {
      throw ParseError.syntax("yaml", origin, error.message, locate(text, error.pos[0]), error)
    }

    const value: unknown = doc.toJS({ mapAsMap: true })
    return value ?? {}
  }

  encode(root: ConfigMapping): string {
    if (root.entries.size === 0) return "{}\n"
    return stringify(toOrdered(root), { lineWidth: 0, aliasDuplicateObjects: false })
  }
}
