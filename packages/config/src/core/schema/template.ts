import type { FieldSchema, Schema, SchemaFields } from "../../ports/schema"
import type { ConfigMapping, ConfigValue } from "../../ports/value"
import { configBoolean, configNull, configNumber, configString, mapping, sequence } from "../value/value"
import { ANY_KEY } from "./validate"

function placeholder(field: FieldSchema): ConfigValue {
  switch (field.kind) {
    case "boolean":
      return configBoolean(false)
    case "number":
      return configNumber(field.min ?? 0)
    case "integer":
      return configNumber(field.min === undefined ? 0 : Math.ceil(field.min))
    case "string":
      return configString("")
    case "sequence":
      return sequence([])
    case "mapping":
      return mapping()
    case "null":
    case "any":
      return configNull()
  }
}

function templateOf(fields: SchemaFields): ConfigMapping {
  const entries: [string, ConfigValue][] = []

  for (const [name, field] of Object.entries(fields)) {
    if (name === ANY_KEY) continue
    const value = templateField(field)
    if (value !== undefined) entries.push([name, value])
  }

  return mapping(entries)
}

function templateField(field: FieldSchema): ConfigValue | undefined {
  if (field.default !== undefined) return field.default

  if (field.kind === "mapping" && field.fields) {
    const nested = templateOf(field.fields)
    return field.required || nested.entries.size > 0 ? nested : undefined
  }

  if (!field.required) return undefined
  return field.allowed?.[0] ?? placeholder(field)
}

/**
 * Skeleton tree for a schema: every field with a default, and every required
 * field, filled with its default, else its first allowed value, else an
 * empty value of its kind. Optional fields without a default are left out.
 */
export function generateTemplate(schema: Schema): ConfigMapping {
  return templateOf(schema.fields)
}
