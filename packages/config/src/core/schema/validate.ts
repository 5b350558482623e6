import type { FieldPath } from "../../ports/path"
import type { FieldKind, FieldSchema, Schema } from "../../ports/schema"
import type { FieldError, ValidateOptions, ValidationResult } from "../../ports/validation"
import type { ConfigMapping, ConfigValue } from "../../ports/value"
import { valuesEqual } from "../value/equality"
import { formatPath } from "../value/path"
import { describeValue } from "../value/value"

/** Key of a field that applies to every undeclared key of its mapping. */
export const ANY_KEY = "*"

export function matchesKind(value: ConfigValue, kind: FieldKind): boolean {
  switch (kind) {
    case "any":
      return true
    case "integer":
      return value.kind === "number" && Number.isInteger(value.value)
    default:
      return value.kind === kind
  }
}

type Context = {
  strict: boolean
  isSensitive: (path: FieldPath) => boolean
  errors: FieldError[]
}

function sizeOf(value: ConfigValue): { size: number; unit: string } | undefined {
  switch (value.kind) {
    case "string":
      return { size: value.value.length, unit: "characters" }
    case "sequence":
      return { size: value.items.length, unit: "items" }
    case "mapping":
      return { size: value.entries.size, unit: "entries" }
    default:
      return undefined
  }
}

function checkConstraints(value: ConfigValue, field: FieldSchema, path: FieldPath, ctx: Context): void {
  const at = formatPath(path)
  const shown = ctx.isSensitive(path) ? "value" : describeValue(value)
  const violation = (constraint: "allowed" | "min" | "max" | "pattern", message: string) => {
    ctx.errors.push({ code: "constraint_violation", constraint, path: at, segments: path, message: `${at}: ${message}` })
  }

  if (field.allowed && !field.allowed.some((allowed) => valuesEqual(allowed, value))) {
    violation("allowed", `${shown} is not one of ${field.allowed.map(describeValue).join(", ")}`)
  }

  if (value.kind === "number") {
    if (field.min !== undefined && value.value < field.min) violation("min", `${shown} is less than ${field.min}`)
    if (field.max !== undefined && value.value > field.max) violation("max", `${shown} is greater than ${field.max}`)
  } else {
    const measured = sizeOf(value)
    if (measured && field.min !== undefined && measured.size < field.min) {
      violation("min", `must have at least ${field.min} ${measured.unit}`)
    }
    if (measured && field.max !== undefined && measured.size > field.max) {
      violation("max", `must have at most ${field.max} ${measured.unit}`)
    }
  }

  if (field.pattern && value.kind === "string" && !field.pattern.test(value.value)) {
    violation("pattern", `${shown} does not match ${String(field.pattern)}`)
  }
}

function checkFields(value: ConfigMapping, fields: Readonly<Record<string, FieldSchema>>, path: FieldPath, ctx: Context) {
  const wildcard = fields[ANY_KEY]

  for (const [name, field] of Object.entries(fields)) {
    if (name === ANY_KEY) continue
    const childPath = [...path, name]
    const child = value.entries.get(name)

    if (child !== undefined) {
      checkNode(child, field, childPath, ctx)
    } else if (field.required) {
      const at = formatPath(childPath)
      ctx.errors.push({
        code: "missing_field",
        expected: field.kind,
        path: at,
        segments: childPath,
        message: `${at}: required field is missing`,
      })
    }
  }

  for (const [name, child] of value.entries) {
    if (Object.hasOwn(fields, name) && name !== ANY_KEY) continue
    const childPath = [...path, name]

    if (wildcard) {
      checkNode(child, wildcard, childPath, ctx)
    } else if (ctx.strict) {
      const at = formatPath(childPath)
      ctx.errors.push({ code: "unknown_field", path: at, segments: childPath, message: `${at}: unknown field` })
    }
  }
}

function checkNode(value: ConfigValue, field: FieldSchema, path: FieldPath, ctx: Context): void {
  if (!matchesKind(value, field.kind)) {
    const at = formatPath(path)
    ctx.errors.push({
      code: "type_mismatch",
      expected: field.kind,
      actual: value.kind,
      path: at,
      segments: path,
      message: `${at}: expected ${field.kind}, got ${value.kind}`,
    })
    return
  }

  checkConstraints(value, field, path, ctx)

  if (value.kind === "mapping" && field.fields) checkFields(value, field.fields, path, ctx)
  if (value.kind === "sequence" && field.items) {
    const { items } = field
    value.items.forEach((item, i) => checkNode(item, items, [...path, i], ctx))
  }
}

/**
 * Check a tree against a schema, collecting every error. Never throws and
 * never changes the tree. Messages name the path and, unless the field is
 * sensitive, the offending value.
 */
export function validate(value: ConfigMapping, schema: Schema, options: ValidateOptions = {}): ValidationResult {
  const ctx: Context = {
    strict: options.strict ?? schema.strict,
    isSensitive: options.isSensitive ?? (() => false),
    errors: [],
  }

  checkFields(value, schema.fields, [], ctx)
  return { ok: ctx.errors.length === 0, errors: ctx.errors }
}

/** Validate a single value against one field. Used to check schema defaults. */
export function validateField(value: ConfigValue, field: FieldSchema, path: FieldPath = []): FieldError[] {
  const ctx: Context = { strict: false, isSensitive: () => false, errors: [] }
  checkNode(value, field, path, ctx)
  return ctx.errors
}
