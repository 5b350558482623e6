import path from "node:path"
import type { ConfigDocument, ConfigFormat } from "../../ports/document"
import type { FormatAdapter } from "../../ports/format-adapter"
import type { ConfigValue } from "../../ports/value"
import { IniFormat } from "../../adapters/ini/ini-format"
import { JsonFormat } from "../../adapters/json/json-format"
import { TomlFormat } from "../../adapters/toml/toml-format"
import { YamlFormat } from "../../adapters/yaml/yaml-format"
import { createDocument } from "../document"
import { InvalidValueError, ParseError, SerializeError, UnsupportedFormatError } from "../errors"
import { fromPlain } from "../value/plain"

const adapters: Readonly<Record<ConfigFormat, FormatAdapter>> = {
  json: new JsonFormat(),
  yaml: new YamlFormat(),
  toml: new TomlFormat(),
  ini: new IniFormat(),
}

export function isConfigFormat(tag: string): tag is ConfigFormat {
  return Object.hasOwn(adapters, tag)
}

/** @throws UnsupportedFormatError */
export function getFormatAdapter(format: string): FormatAdapter {
  if (!isConfigFormat(format)) throw UnsupportedFormatError.tag(format)
  return adapters[format]
}

/** @throws UnsupportedFormatError for unknown extensions */
export function detectFormat(file: string): ConfigFormat {
  const ext = path.extname(file).toLowerCase()
  const adapter = Object.values(adapters).find((a) => a.extensions.includes(ext))
  if (!adapter) throw UnsupportedFormatError.extension(file)
  return adapter.format
}

/**
 * Parse text into a document whose root is a mapping.
 *
 * @throws ParseError with code `syntax_error`, `root_type_error` or `invalid_value`
 * @throws UnsupportedFormatError
 */
export function parse(raw: string, format: string, origin = "<input>"): ConfigDocument {
  const adapter = getFormatAdapter(format)
  const decoded = adapter.decode(raw, origin)

  let root: ConfigValue
  try {
    root = fromPlain(decoded)
  } catch (err) {
    if (err instanceof InvalidValueError) throw ParseError.invalidValue(adapter.format, origin, err)
    throw err
  }

  if (root.kind !== "mapping") throw ParseError.rootType(adapter.format, origin, root.kind)
  return createDocument(root, adapter.format, origin)
}

/**
 * Render a tree in `format`. Deterministic for a given tree.
 *
 * @throws SerializeError when the tree is not a mapping or the format cannot express it
 */
export function serialize(value: ConfigValue, format: string): string {
  const adapter = getFormatAdapter(format)
  if (value.kind !== "mapping") throw new SerializeError(adapter.format, [], `document root must be a mapping, got ${value.kind}`)
  return adapter.encode(value)
}
