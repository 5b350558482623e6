import type { FieldPath } from "../../ports/path"
import type { FieldSchema, Schema, SchemaFields } from "../../ports/schema"
import type { ConfigMapping, ConfigValue } from "../../ports/value"
import { formatPath } from "../value/path"
import { mapping } from "../value/value"
import { ANY_KEY } from "./validate"

export type DefaultsResult = {
  value: ConfigMapping
  /** Dotted paths that received a default. */
  applied: string[]
}

function fillMapping(
  value: ConfigMapping | undefined,
  fields: SchemaFields,
  path: FieldPath,
  applied: string[],
): ConfigMapping | undefined {
  const entries = new Map<string, ConfigValue>(value?.entries)
  let changed = false

  for (const [name, field] of Object.entries(fields)) {
    if (name === ANY_KEY) continue
    const childPath = [...path, name]
    const current = entries.get(name)
    const next = fillField(current, field, childPath, applied)

    if (next !== undefined && next !== current) {
      entries.set(name, next)
      changed = true
    }
  }

  if (!changed) return value
  return mapping(entries)
}

function fillField(
  current: ConfigValue | undefined,
  field: FieldSchema,
  path: FieldPath,
  applied: string[],
): ConfigValue | undefined {
  if (current === undefined && field.default !== undefined) {
    applied.push(formatPath(path))
    return field.default
  }

  if (!field.fields) return current
  if (current !== undefined && current.kind !== "mapping") return current

  return fillMapping(current, field.fields, path, applied)
}

/**
 * Fill absent fields that declare a default. An absent mapping is created
 * only when something below it has a default. Present values, including
 * ones of the wrong kind, are left alone.
 */
export function applyDefaults(value: ConfigMapping, schema: Schema): DefaultsResult {
  const applied: string[] = []
  const filled = fillMapping(value, schema.fields, [], applied) ?? value
  return { value: filled, applied }
}
