import { parse, stringify } from "ini"
import type { FieldPath } from "../../ports/path"
import type { FormatAdapter } from "../../ports/format-adapter"
import type { ConfigMapping, ConfigValue, PlainMapping, PlainValue } from "../../ports/value"
import { ParseError, SerializeError } from "../../core/errors"

/**
 * Sections nest through dotted headers (`[db.replica]`). Every scalar reads
 * back as a string except `true`, `false` and `null`; empty mappings and
 * empty sequences are not written; sequences hold scalars only (`key[] = v`).
 *
 * Every line must be blank, a `;` or `#` comment, a `[section]` header or a
 * `key = value` pair.
 */
export class IniFormat implements FormatAdapter {
  readonly format = "ini"
  readonly extensions = [".ini", ".cfg", ".conf"]

  decode(text: string, origin: string): unknown {
    checkLines(text, origin)
    return parse(text)
  }

  encode(root: ConfigMapping): string {
    const text = stringify(toSection(root, []), { whitespace: true })
    return text.endsWith("\n") || text === "" ? text : `${text}\n`
  }
}

const SECTION = /^\[[^\]]*\]\s*$/
const PAIR = /^\s*[^=\s][^=]*=/

function checkLines(text: string, origin: string): void {
  for (const [i, line] of text.split(/\r\n|\r|\n/).entries()) {
    const trimmed = line.trim()
    if (trimmed === "" || trimmed.startsWith(";") || trimmed.startsWith("#")) continue
    if (SECTION.test(line) || PAIR.test(line)) continue

    if (line.startsWith("[")) {
      throw ParseError.syntax("ini", origin, "section header is not closed with ]", {
        line: i + 1,
        column: line.length + 1,
      })
    }
    throw ParseError.syntax("ini", origin, "expected key = value, a [section] header or a comment", {
      line: i + 1,
      column: line.length - line.trimStart().length + 1,
    })
  }
}

function toSection(value: ConfigMapping, path: FieldPath): PlainMapping {
  const section: PlainMapping = {}
  for (const [key, item] of value.entries) {
    const plain = toIni(item, [...path, key])
    if (plain !== undefined) section[key] = plain
  }
  return section
}

function toIni(value: ConfigValue, path: FieldPath): PlainValue | undefined {
  switch (value.kind) {
    case "null":
      return null
    case "boolean":
      return value.value
    case "number":
    case "string":
      return String(value.value)
    case "mapping": {
      const section = toSection(value, path)
      return Object.keys(section).length > 0 ? section : undefined
    }
    case "sequence":
      if (value.items.length === 0) return undefined
      return value.items.map((item, i) => {
        if (item.kind === "mapping" || item.kind === "sequence") {
          throw new SerializeError("ini", [...path, i], `sequences may only hold scalars, got ${item.kind}`)
        }
        return item.kind === "null" ? null : String(item.value)
      })
  }
}
