/**
 * Format-independent configuration tree.
 *
 * Mapping keys are unique and keep insertion order. Numbers are finite.
 */
export type ConfigNull = { readonly kind: "null" }
export type ConfigBoolean = { readonly kind: "boolean"; readonly value: boolean }
export type ConfigNumber = { readonly kind: "number"; readonly value: number }
export type ConfigString = { readonly kind: "string"; readonly value: string }

export type ConfigSequence = {
  readonly kind: "sequence"
  readonly items: readonly ConfigValue[]
}

export type ConfigMapping = {
  readonly kind: "mapping"
  readonly entries: ReadonlyMap<string, ConfigValue>
}

export type ConfigScalar = ConfigNull | ConfigBoolean | ConfigNumber | ConfigString

export type ConfigValue = ConfigScalar | ConfigSequence | ConfigMapping

export type ValueKind = ConfigValue["kind"]

/** JSON-shaped equivalent of a ConfigValue. */
export type PlainValue = null | boolean | number | string | PlainValue[] | PlainMapping

export type PlainMapping = { [key: string]: PlainValue }

/** PlainValue with mappings as `Map`s, which keep integer-like keys in place. */
export type OrderedValue = null | boolean | number | string | OrderedValue[] | Map<string, OrderedValue>
