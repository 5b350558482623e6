import type { FieldPath } from "../../ports/path"
import type { ConfigMapping, ConfigValue, OrderedValue, PlainMapping, PlainValue } from "../../ports/value"
import { InvalidValueError } from "../errors"
import { configBoolean, configNull, configNumber, configString, mapping, sequence } from "./value"

/**
 * Convert decoded data to a ConfigValue.
 *
 * Dates become ISO-8601 strings; safe bigints become numbers; `undefined`
 * object properties are skipped. `Map`s become mappings in their own order,
 * with scalar keys turned into strings.
 *
 * @throws InvalidValueError for non-finite numbers, functions, symbols and
 *         out-of-range bigints
 */
export function fromPlain(input: unknown, path: FieldPath = []): ConfigValue {
  if (input === null) return configNull()

  switch (typeof input) {
    case "boolean":
      return configBoolean(input)
    case "string":
      return configString(input)
    case "number":
      if (!Number.isFinite(input)) throw new InvalidValueError(path, `number ${input} is not finite`)
      return configNumber(input)
    case "bigint":
      if (input > BigInt(Number.MAX_SAFE_INTEGER) || input < BigInt(Number.MIN_SAFE_INTEGER)) {
        throw new InvalidValueError(path, `integer ${input} is outside the safe range`)
      }
      return configNumber(Number(input))
    case "object":
      break
    default:
      throw new InvalidValueError(path, `${typeof input} values are not supported`)
  }

  if (input instanceof Date) {
    if (Number.isNaN(input.getTime())) throw new InvalidValueError(path, "invalid date")
    return configString(input.toISOString())
  }

  if (Array.isArray(input)) {
    return sequence(
      input.map((item: unknown, index) => {
        if (item === undefined) throw new InvalidValueError([...path, index], "undefined is not a value")
        return fromPlain(item, [...path, index])
      }),
    )
  }

  if (input instanceof Map) return mappingFromMap(input, path)

  const entries: [string, ConfigValue][] = []
  for (const [key, value] of Object.entries(input)) {
    if (value === undefined) continue
    entries.push([key, fromPlain(value, [...path, key])])
  }
  return mapping(entries)
}

function mapKey(key: unknown, path: FieldPath): string {
  if (key === null) return ""
  switch (typeof key) {
    case "string":
      return key
    case "number":
    case "boolean":
    case "bigint":
      return String(key)
    default:
      throw new InvalidValueError(path, "mapping keys must be scalars")
  }
}

function mappingFromMap(input: ReadonlyMap<unknown, unknown>, path: FieldPath): ConfigMapping {
  const entries = new Map<string, ConfigValue>()
  for (const [rawKey, value] of input) {
    if (value === undefined) continue
    const key = mapKey(rawKey, path)
    entries.set(key, fromPlain(value, [...path, key]))
  }
  return mapping(entries)
}

/** `fromPlain` for data whose root must be a mapping. */
export function mappingFromPlain(input: unknown, path: FieldPath = []): ConfigMapping {
  const value = fromPlain(input, path)
  if (value.kind !== "mapping") throw new InvalidValueError(path, `expected a mapping, got ${value.kind}`)
  return value
}

export function toPlain(value: ConfigMapping): PlainMapping
export function toPlain(value: ConfigValue): PlainValue
export function toPlain(value: ConfigValue): PlainValue {
  switch (value.kind) {
    case "null":
      return null
    case "boolean":
    case "number":
    case "string":
      return value.value
    case "sequence":
      return value.items.map((item) => toPlain(item))
    case "mapping":
      return Object.fromEntries([...value.entries].map(([key, item]) => [key, toPlain(item)]))
  }
}

export function toOrdered(value: ConfigValue): OrderedValue {
  switch (value.kind) {
    case "null":
      return null
    case "boolean":
    case "number":
    case "string":
      return value.value
    case "sequence":
      return value.items.map((item) => toOrdered(item))
    case "mapping":
      return new Map([...value.entries].map(([key, item]) => [key, toOrdered(item)] as const))
  }
}
