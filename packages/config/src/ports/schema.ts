import type { ConfigValue, ValueKind } from "./value"

/** `integer` is a number without fraction; `any` accepts every kind. */
export type FieldKind = ValueKind | "integer" | "any"

export type FieldSchema = {
  readonly kind: FieldKind
  readonly required: boolean
  /** Value must equal one of these. */
  readonly allowed?: readonly ConfigValue[]
  /** Child fields of a mapping. */
  readonly fields?: SchemaFields
  /** Schema every item of a sequence must satisfy. */
  readonly items?: FieldSchema
  /** Lower bound on a number, a string's length, or an item/entry count. */
  readonly min?: number
  readonly max?: number
  /** Strings only. */
  readonly pattern?: RegExp
  readonly default?: ConfigValue
  readonly description?: string
}

export type SchemaFields = Readonly<Record<string, FieldSchema>>

export type Schema = {
  readonly fields: SchemaFields
  /** Report keys the schema does not declare. */
  readonly strict: boolean
}
