import { z } from "zod"
import type { FieldKind } from "../../ports/schema"

export const fieldKinds = [
  "null",
  "boolean",
  "number",
  "integer",
  "string",
  "sequence",
  "mapping",
  "any",
] as const satisfies readonly FieldKind[]

/**
 * A field as written in a schema document: either just its kind, or an
 * object. Field names may be dotted (`db.host`) to declare nested fields.
 */
export type FieldDefinition =
  | FieldKind
  | {
      type: FieldKind
      required?: boolean
      enum?: unknown[]
      fields?: { [name: string]: FieldDefinition }
      items?: FieldDefinition
      min?: number
      max?: number
      pattern?: string
      default?: unknown
      description?: string
    }

export type SchemaDefinition = {
  strict?: boolean
  fields: { [name: string]: FieldDefinition }
}

const kind = z.enum(fieldKinds)

export const fieldDefinition: z.ZodType<FieldDefinition> = z.lazy(() =>
  z.union([
    kind,
    z.strictObject({
      type: kind,
      required: z.boolean().optional(),
      enum: z.array(z.unknown()).min(1).optional(),
      fields: z.record(z.string(), fieldDefinition).optional(),
      items: fieldDefinition.optional(),
      min: z.number().optional(),
      max: z.number().optional(),
      pattern: z.string().optional(),
      default: z.unknown().optional(),
      description: z.string().optional(),
    }),
  ]),
)

export const schemaDefinition: z.ZodType<SchemaDefinition> = z.strictObject({
  strict: z.boolean().optional(),
  fields: z.record(z.string(), fieldDefinition),
})
