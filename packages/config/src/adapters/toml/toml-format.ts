import { parse, stringify, type JsonMap } from "@iarna/toml"
import type { FieldPath } from "../../ports/path"
import type { FormatAdapter } from "../../ports/format-adapter"
import type { ConfigMapping, ConfigSequence, ConfigValue } from "../../ports/value"
import { ParseError, SerializeError, type ParseLocation } from "../../core/errors"

type TomlArray = boolean[] | number[] | string[] | JsonMap[] | TomlArray[]
type TomlValue = boolean | number | string | JsonMap | TomlArray

function locationOf(err: unknown): ParseLocation | undefined {
  if (!(err instanceof Error)) return undefined
  const line: unknown = Reflect.get(err, "line")
  const col: unknown = Reflect.get(err, "col")
  return typeof line === "number" && typeof col === "number" ? { line: line + 1, column: col + 1 } : undefined
}

function detailOf(err: unknown): string {
  const message = err instanceof Error ? err.message : String(err)
  return message.split("\n")[0] ?? message
}

/**
 * TOML has no null, so null is written as `""`. Dates decode to ISO-8601
 * strings. Arrays must hold one kind of item. Integers outside the safe range
 * are refused.
 */
export class TomlFormat implements FormatAdapter {
  readonly format = "toml"
  readonly extensions = [".toml"]

  decode(text: string, origin: string): unknown {
    try {
      return parse(text)
    } catch (err) {
      throw ParseError.syntax("toml", origin, detailOf(err), locationOf(err), err)
    }
  }

  encode(root: ConfigMapping): string {
    const text = stringify(toTable(root, []))
    return text.endsWith("\n") ? text : `${text}\n`
  }
}

function toTable(value: ConfigMapping, path: FieldPath): JsonMap {
  const table: JsonMap = {}
  for (const [key, item] of value.entries) table[key] = toToml(item, [...path, key])
  return table
}

function toToml(value: ConfigValue, path: FieldPath): TomlValue {
  switch (value.kind) {
    case "null":
      return ""
    case "number":
      return checkInteger(value.value, path)
    case "boolean":
    case "string":
      return value.value
    case "mapping":
      return toTable(value, path)
    case "sequence":
      return toArray(value, path)
  }
}

function toArray(value: ConfigSequence, path: FieldPath): TomlArray {
  let kind: string | undefined

  for (const [i, item] of value.items.entries()) {
    const itemKind = item.kind === "null" ? "string" : item.kind
    if (kind !== undefined && kind !== itemKind) {
      throw new SerializeError("toml", [...path, i], `array mixes ${kind} and ${itemKind} items`)
    }
    kind = itemKind
  }

  const { items } = value
  switch (kind) {
    case "mapping":
      return items.flatMap((item, i) => (item.kind === "mapping" ? [toTable(item, [...path, i])] : []))
    case "sequence":
      return items.map((item, i): TomlArray => (item.kind === "sequence" ? toArray(item, [...path, i]) : []))
    case "boolean":
      return items.flatMap((item) => (item.kind === "boolean" ? [item.value] : []))
    case "number":
      return items.flatMap((item, i) => (item.kind === "number" ? [checkInteger(item.value, [...path, i])] : []))
    default:
      return items.flatMap((item) => (item.kind === "string" ? [item.value] : item.kind === "null" ? [""] : []))
  }
}

function checkInteger(value: number, path: FieldPath): number {
  if (Number.isInteger(value) && !Number.isSafeInteger(value)) {
    throw new SerializeError("toml", path, "integer is outside the safe range")
  }
  return value
}
