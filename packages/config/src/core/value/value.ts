import type {
  ConfigBoolean,
  ConfigMapping,
  ConfigNull,
  ConfigNumber,
  ConfigScalar,
  ConfigSequence,
  ConfigString,
  ConfigValue,
} from "../../ports/value"

const NULL: ConfigNull = Object.freeze({ kind: "null" })

export function configNull(): ConfigNull {
  return NULL
}

export function configBoolean(value: boolean): ConfigBoolean {
  return Object.freeze({ kind: "boolean", value })
}

/** @throws RangeError for NaN and infinities */
export function configNumber(value: number): ConfigNumber {
  if (!Number.isFinite(value)) throw new RangeError(`Configuration numbers must be finite, got ${value}`)
  return Object.freeze({ kind: "number", value })
}

export function configString(value: string): ConfigString {
  return Object.freeze({ kind: "string", value })
}

export function sequence(items: Iterable<ConfigValue>): ConfigSequence {
  return Object.freeze({ kind: "sequence", items: Object.freeze([...items]) })
}

/**
 * Build a mapping from entries or a record of values.
 *
 * @example
 * ```ts
 * mapping({ db: mapping({ host: configString("localhost") }) })
 * ```
 */
export function mapping(
  entries: Iterable<readonly [string, ConfigValue]> | Readonly<Record<string, ConfigValue>> = [],
): ConfigMapping {
  const pairs = isEntryIterable(entries) ? entries : Object.entries(entries)
  return Object.freeze({ kind: "mapping", entries: new Map(pairs) })
}

function isEntryIterable(
  entries: Iterable<readonly [string, ConfigValue]> | Readonly<Record<string, ConfigValue>>,
): entries is Iterable<readonly [string, ConfigValue]> {
  return typeof Reflect.get(entries, Symbol.iterator) === "function"
}

export function isMapping(value: ConfigValue): value is ConfigMapping {
  return value.kind === "mapping"
}

export function isSequence(value: ConfigValue): value is ConfigSequence {
  return value.kind === "sequence"
}

export function isScalar(value: ConfigValue): value is ConfigScalar {
  return value.kind !== "mapping" && value.kind !== "sequence"
}

/** Copy of `map` with `key` set to `value`, keeping the key's position when it exists. */
export function withEntry(map: ConfigMapping, key: string, value: ConfigValue): ConfigMapping {
  const entries = new Map(map.entries)
  entries.set(key, value)
  return mapping(entries)
}

export function withoutEntry(map: ConfigMapping, key: string): ConfigMapping {
  const entries = new Map(map.entries)
  entries.delete(key)
  return mapping(entries)
}

/** Short human description of a value, e.g. for error messages. */
export function describeValue(value: ConfigValue): string {
  switch (value.kind) {
    case "null":
      return "null"
    case "boolean":
    case "number":
      return String(value.value)
    case "string":
      return JSON.stringify(value.value)
    case "sequence":
      return `a sequence of ${value.items.length}`
    case "mapping":
      return `a mapping of ${value.entries.size}`
  }
}
