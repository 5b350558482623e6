export { DotenvSource } from "./adapters/dotenv/dotenv-source"
export type { DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource } from "./adapters/env/env-source"
export type { EnvSourceOptions } from "./adapters/env/env-source"
export { FileSource } from "./adapters/file/file-source"
export type { FileSourceOptions } from "./adapters/file/file-source"
export { readDocument } from "./adapters/file/read-document"
export { IniFormat } from "./adapters/ini/ini-format"
export { JsonFormat } from "./adapters/json/json-format"
export { ObjectSource } from "./adapters/object/object-source"
export { TomlFormat } from "./adapters/toml/toml-format"
export { YamlFormat } from "./adapters/yaml/yaml-format"
export { Config, DEFAULT_SOURCE } from "./core/config/config"
export type { ConfigInit } from "./core/config/config"
export { loadConfig, mergeSources } from "./core/config/load-config"
export type { LoadConfigOptions, MergeSourcesOptions } from "./core/config/load-config"
export { createDocument, withRoot } from "./core/document"
export { envLookup } from "./core/env/env-lookup"
export { resolveEnv } from "./core/env/resolve-env"
export type { ResolveEnvOptions } from "./core/env/resolve-env"
export {
  InvalidValueError,
  ParseError,
  SchemaDefinitionError,
  SerializeError,
  SourceNotFoundError,
  UnresolvedReferenceError,
  UnsupportedFormatError,
  ValidationFailedError,
} from "./core/errors"
export type { ParseErrorCode, ParseLocation } from "./core/errors"
export { detectFormat, getFormatAdapter, isConfigFormat, parse, serialize } from "./core/format/format-registry"
export { merge } from "./core/merge/merge"
export { applyDefaults } from "./core/schema/defaults"
export type { DefaultsResult } from "./core/schema/defaults"
export { defineSchema, parseSchema } from "./core/schema/parse-schema"
export { fieldKinds } from "./core/schema/schema-definition"
export type { FieldDefinition, SchemaDefinition } from "./core/schema/schema-definition"
export { generateTemplate } from "./core/schema/template"
export { ANY_KEY, matchesKind, validate, validateField } from "./core/schema/validate"
export { canonicalize, contentHash } from "./core/value/canonical"
export { valuesEqual } from "./core/value/equality"
export { formatPath, getAtPath, matchesPattern, parsePath, toFieldPath } from "./core/value/path"
export { stringifyJson } from "./core/value/json-text"
export { fromPlain, mappingFromPlain, toOrdered, toPlain } from "./core/value/plain"
export {
  configBoolean,
  configNull,
  configNumber,
  configString,
  describeValue,
  isMapping,
  isScalar,
  isSequence,
  mapping,
  sequence,
  withEntry,
  withoutEntry,
} from "./core/value/value"
export { mapLeaves, walk } from "./core/value/walk"
export type { IConfig } from "./ports/config"
export { configFormats } from "./ports/document"
export type { ConfigDocument, ConfigFormat } from "./ports/document"
export type { EnvLookup, EnvRecord } from "./ports/env"
export type { FormatAdapter } from "./ports/format-adapter"
export type {
  ConflictKind,
  MergeConflict,
  MergeOptions,
  MergeResult,
  MergeSource,
  SequencePolicy,
} from "./ports/merge"
export { WILDCARD } from "./ports/path"
export type { FieldPath, PathSegment } from "./ports/path"
export type { FieldKind, FieldSchema, Schema, SchemaFields } from "./ports/schema"
export type { ConfigSource } from "./ports/source"
export type {
  Constraint,
  ConstraintViolationError,
  FieldError,
  MissingFieldError,
  TypeMismatchError,
  UnknownFieldError,
  ValidateOptions,
  ValidationResult,
} from "./ports/validation"
export type {
  ConfigBoolean,
  ConfigMapping,
  ConfigNull,
  ConfigNumber,
  ConfigScalar,
  ConfigSequence,
  ConfigString,
  ConfigValue,
  OrderedValue,
  PlainMapping,
  PlainValue,
  ValueKind,
} from "./ports/value"
