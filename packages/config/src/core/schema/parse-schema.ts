import { z } from "zod"
import type { FieldKind, FieldSchema, Schema, SchemaFields } from "../../ports/schema"
import type { ConfigValue } from "../../ports/value"
import { InvalidValueError, SchemaDefinitionError } from "../errors"
import { formatPath, parsePath } from "../value/path"
import { fromPlain, toPlain } from "../value/plain"
import { type FieldDefinition, schemaDefinition, type SchemaDefinition } from "./schema-definition"
import { validateField } from "./validate"

/** A field before requiredness is settled. Mappings created by dotted names are not `declared`. */
type Draft = {
  kind: FieldKind
  declared: boolean
  required?: boolean
  allowed?: ConfigValue[]
  fields?: Record<string, Draft>
  items?: Draft
  min?: number
  max?: number
  pattern?: RegExp
  default?: ConfigValue
  description?: string
  where: string
}

type Builder = {
  origin: string | undefined
}

function fail(ctx: Builder, reason: string): never {
  throw new SchemaDefinitionError(reason, ctx.origin)
}

function valueOf(ctx: Builder, input: unknown, where: string): ConfigValue {
  try {
    return fromPlain(input)
  } catch (err) {
    if (err instanceof InvalidValueError) fail(ctx, `${where}: ${err.message}`)
    throw err
  }
}

function regexOf(ctx: Builder, source: string, where: string): RegExp {
  try {
    return new RegExp(source)
  } catch (err) {
    return fail(ctx, `${where}: invalid pattern: ${err instanceof Error ? err.message : String(err)}`)
  }
}

function draftField(ctx: Builder, definition: FieldDefinition, where: string): Draft {
  if (typeof definition === "string") return { kind: definition, declared: true, where }

  return {
    kind: definition.type,
    declared: true,
    where,
    ...(definition.required !== undefined && { required: definition.required }),
    ...(definition.enum && { allowed: definition.enum.map((v, i) => valueOf(ctx, v, `${where}.enum[${i}]`)) }),
    ...(definition.fields && { fields: draftFields(ctx, definition.fields, where) }),
    ...(definition.items !== undefined && { items: draftField(ctx, definition.items, `${where}[]`) }),
    ...(definition.min !== undefined && { min: definition.min }),
    ...(definition.max !== undefined && { max: definition.max }),
    ...(definition.pattern !== undefined && { pattern: regexOf(ctx, definition.pattern, where) }),
    ...(definition.default !== undefined && { default: valueOf(ctx, definition.default, `${where}.default`) }),
    ...(definition.description !== undefined && { description: definition.description }),
  }
}

function qualify(parent: string, name: string): string {
  return parent ? `${parent}.${name}` : name
}

/** Expand dotted names into nested mapping drafts. */
function draftFields(ctx: Builder, definitions: { [name: string]: FieldDefinition }, parent: string) {
  const tree: Record<string, Draft> = {}

  for (const [name, definition] of Object.entries(definitions)) {
    let segments: string[]
    try {
      segments = parsePath(name).map((segment) => {
        if (typeof segment === "number") fail(ctx, `${qualify(parent, name)}: field names cannot contain indexes`)
        return String(segment)
      })
    } catch (err) {
      if (err instanceof SyntaxError) fail(ctx, `${qualify(parent, name)}: ${err.message}`)
      throw err
    }

    const where = qualify(parent, formatPath(segments))
    insert(ctx, tree, segments, draftField(ctx, definition, where))
  }

  return tree
}

function insert(ctx: Builder, tree: Record<string, Draft>, segments: readonly string[], draft: Draft): void {
  const [head, ...rest] = segments
  if (head === undefined) return
  const existing = tree[head]

  if (rest.length === 0) {
    if (!existing) {
      tree[head] = draft
    } else if (existing.declared) {
      fail(ctx, `${draft.where}: declared more than once`)
    } else if (draft.kind !== "mapping") {
      fail(ctx, `${draft.where}: has fields declared below it, so it must be a mapping`)
    } else {
      tree[head] = { ...draft, fields: { ...existing.fields, ...draft.fields } }
    }
    return
  }

  if (existing && existing.kind !== "mapping") {
    fail(ctx, `${draft.where}: ${existing.where} is declared as ${existing.kind}`)
  }

  const parent: Draft = existing ?? {
    kind: "mapping",
    declared: false,
    where: draft.where.slice(0, draft.where.length - formatPath(rest).length - 1),
  }
  const fields = { ...parent.fields }
  insert(ctx, fields, rest, draft)
  tree[head] = { ...parent, fields }
}

function settle(ctx: Builder, draft: Draft): FieldSchema {
  const fields = draft.fields && settleFields(ctx, draft.fields)
  const items = draft.items && settle(ctx, draft.items)

  const field: FieldSchema = {
    kind: draft.kind,
    required: draft.required ?? (fields !== undefined && Object.values(fields).some((f) => f.required)),
    ...(draft.allowed && { allowed: draft.allowed }),
    ...(fields && { fields }),
    ...(items && { items }),
    ...(draft.min !== undefined && { min: draft.min }),
    ...(draft.max !== undefined && { max: draft.max }),
    ...(draft.pattern && { pattern: draft.pattern }),
    ...(draft.description !== undefined && { description: draft.description }),
  }

  if (draft.default === undefined) return field

  const [problem] = validateField(draft.default, field)
  if (problem) fail(ctx, `${draft.where}: default does not satisfy the field: ${problem.message.replace(/^: /, "")}`)
  return { ...field, default: draft.default }
}

function settleFields(ctx: Builder, drafts: Record<string, Draft>): SchemaFields {
  return Object.fromEntries(Object.entries(drafts).map(([name, draft]) => [name, settle(ctx, draft)]))
}

/**
 * Read a schema document, e.g. a parsed YAML file:
 *
 * ```yaml
 * strict: true
 * fields:
 *   db.host: { type: string, required: true }
 *   db.port: { type: integer, default: 5432, min: 1, max: 65535 }
 *   log_level: { type: string, enum: [debug, info, warn] }
 *   tags: { type: sequence, items: string }
 *   services.*.url: string
 * ```
 *
 * A mapping that does not set `required` itself is required when a field
 * below it is. A `*` name applies to every key its mapping does not declare.
 *
 * @throws SchemaDefinitionError
 */
export function parseSchema(definition: ConfigValue, origin?: string): Schema {
  const ctx: Builder = { origin }
  const result = schemaDefinition.safeParse(toPlain(definition))
  if (!result.success) fail(ctx, z.prettifyError(result.error))

  return {
    fields: settleFields(ctx, draftFields(ctx, result.data.fields, "")),
    strict: result.data.strict ?? false,
  }
}

/** Typed programmatic equivalent of `parseSchema`. */
export function defineSchema(definition: SchemaDefinition): Schema {
  return parseSchema(valueOf({ origin: undefined }, definition, "schema"))
}
