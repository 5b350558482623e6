import type { FieldPath } from "./path"
import type { FieldKind } from "./schema"
import type { ValueKind } from "./value"

type FieldErrorBase = {
  /** Dotted path of the offending field. */
  readonly path: string
  readonly segments: FieldPath
  readonly message: string
}

export type MissingFieldError = FieldErrorBase & {
  readonly code: "missing_field"
  readonly expected: FieldKind
}

export type TypeMismatchError = FieldErrorBase & {
  readonly code: "type_mismatch"
  readonly expected: FieldKind
  readonly actual: ValueKind
}

export type Constraint = "allowed" | "min" | "max" | "pattern"

export type ConstraintViolationError = FieldErrorBase & {
  readonly code: "constraint_violation"
  readonly constraint: Constraint
}

export type UnknownFieldError = FieldErrorBase & {
  readonly code: "unknown_field"
}

export type FieldError =
  | MissingFieldError
  | TypeMismatchError
  | ConstraintViolationError
  | UnknownFieldError

export type ValidationResult = {
  readonly ok: boolean
  readonly errors: readonly FieldError[]
}

export type ValidateOptions = {
  /** Overrides `Schema.strict`. */
  strict?: boolean
  /** Fields for which messages must not show the value. */
  isSensitive?: (path: FieldPath) => boolean
}
