import { parseDocument } from "yaml"
import type { FormatAdapter } from "../../ports/format-adapter"
import type { ConfigMapping } from "../../ports/value"
import { ParseError, type ParseLocation } from "../../core/errors"
import { locate } from "../../core/format/locate"
import { stringifyJson } from "../../core/value/json-text"

const LINE_COLUMN = /line (\d+) column (\d+)/
const POSITION = /at position (\d+)/

function locationOf(message: string, text: string): ParseLocation | undefined {
  const lineColumn = LINE_COLUMN.exec(message)
  if (lineColumn) return { line: Number(lineColumn[1]), column: Number(lineColumn[2]) }

  const position = POSITION.exec(message)
  if (position) return locate(text, Number(position[1]))

  return undefined
}

/**
 * Lossless, key order included. `JSON.parse` checks the syntax; the text is
 * then read again by `yaml`'s JSON schema into `Map`s, since plain objects
 * move integer-like keys to the front. Output is two-space indented with a
 * trailing newline.
 */
export class JsonFormat implements FormatAdapter {
  readonly format = "json"
  readonly extensions = [".json"]

  decode(text: string, origin: string): unknown {
    let plain: unknown
    try {
      plain = JSON.parse(text)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw ParseError.syntax("json", origin, message, locationOf(message, text), err)
    }

    const doc = parseDocument(text, { schema: "json", uniqueKeys: false })
    if (doc.errors.length > 0) return plain
    return doc.toJS({ mapAsMap: true })
  }

  encode(root: ConfigMapping): string {
    return `${stringifyJson(root, 2)}\n`
  }
}
