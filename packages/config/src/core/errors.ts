import { BaseError } from "@tessera/errors"
import type { ConfigFormat } from "../ports/document"
import type { FieldPath } from "../ports/path"
import type { FieldError } from "../ports/validation"
import type { ValueKind } from "../ports/value"
import { formatPath } from "./value/path"

export type ParseLocation = {
  /** 1-based. */
  line: number
  /** 1-based. */
  column: number
}

function at(location: ParseLocation | undefined): string {
  return location ? ` at line ${location.line}, column ${location.column}` : ""
}

function displayPath(path: FieldPath): string {
  return formatPath(path) || "<root>"
}

export type ParseErrorCode = "syntax_error" | "root_type_error" | "invalid_value"

/** Text could not be turned into a configuration document. */
export class ParseError extends BaseError<ParseErrorCode> {
  static syntax(
    format: ConfigFormat,
    origin: string,
    detail: string,
    location?: ParseLocation,
    cause?: unknown,
  ): ParseError {
    return new ParseError(`${origin}: invalid ${format.toUpperCase()}${at(location)}: ${detail}`, {
      code: "syntax_error",
      context: { format, origin, ...(location && { line: location.line, column: location.column }) },
      cause,
    })
  }

  static rootType(format: ConfigFormat, origin: string, actual: ValueKind): ParseError {
    return new ParseError(`${origin}: document root must be a mapping, got ${actual}`, {
      code: "root_type_error",
      context: { format, origin, actual },
    })
  }

  static invalidValue(format: ConfigFormat, origin: string, cause: InvalidValueError): ParseError {
    return new ParseError(`${origin}: ${cause.message}`, {
      code: "invalid_value",
      context: { format, origin, path: cause.context.path },
      cause,
    })
  }

  get location(): ParseLocation | undefined {
    const { line, column } = this.context
    return typeof line === "number" && typeof column === "number" ? { line, column } : undefined
  }
}

/** A JavaScript value has no ConfigValue counterpart (non-finite number, function, ...). */
export class InvalidValueError extends BaseError<"invalid_value"> {
  constructor(path: FieldPath, reason: string) {
    super(`${displayPath(path)}: ${reason}`, {
      code: "invalid_value",
      context: { path: formatPath(path), reason },
    })
  }
}

export class UnsupportedFormatError extends BaseError<"unsupported_format"> {
  static tag(format: string): UnsupportedFormatError {
    return new UnsupportedFormatError(`Unsupported configuration format "${format}"`, {
      code: "unsupported_format",
      context: { format },
    })
  }

  static extension(file: string): UnsupportedFormatError {
    return new UnsupportedFormatError(`Cannot tell the configuration format of "${file}" from its extension`, {
      code: "unsupported_format",
      context: { file },
    })
  }
}

/** A tree uses something the target format cannot express. */
export class SerializeError extends BaseError<"serialize_error"> {
  constructor(format: ConfigFormat, path: FieldPath, reason: string) {
    super(`Cannot write ${displayPath(path)} as ${format.toUpperCase()}: ${reason}`, {
      code: "serialize_error",
      context: { format, path: formatPath(path), reason },
    })
  }
}

export class UnresolvedReferenceError extends BaseError<"unresolved_reference"> {
  constructor(path: FieldPath, variable: string, origin?: string) {
    super(
      `${origin ? `${origin}: ` : ""}${displayPath(path)} references \${${variable}}, which is not set and has no default`,
      {
        code: "unresolved_reference",
        context: { path: formatPath(path), variable, ...(origin && { origin }) },
      },
    )
  }

  get variable(): string {
    return String(this.context.variable)
  }

  get path(): string {
    return String(this.context.path)
  }
}

/** Thrown by operations that require a valid tree. Messages never contain sensitive values. */
export class ValidationFailedError extends BaseError<"validation_failed"> {
  readonly errors: readonly FieldError[]

  constructor(errors: readonly FieldError[]) {
    super(`Configuration validation failed:\n${errors.map((e) => `  - ${e.message}`).join("\n")}`, {
      code: "validation_failed",
      context: { errors: errors.map(({ code, path, message }) => ({ code, path, message })) },
    })
    this.errors = errors
  }
}

/** A schema definition document is malformed. */
export class SchemaDefinitionError extends BaseError<"schema_definition_error"> {
  constructor(reason: string, origin?: string) {
    super(`Invalid schema${origin ? ` ${origin}` : ""}:\n${reason}`, {
      code: "schema_definition_error",
      context: { reason, ...(origin && { origin }) },
    })
  }
}

export class SourceNotFoundError extends BaseError<"source_not_found"> {
  static file(file: string): SourceNotFoundError {
    return new SourceNotFoundError(`Required configuration file "${file}" does not exist`, {
      code: "source_not_found",
      context: { file },
    })
  }
}
