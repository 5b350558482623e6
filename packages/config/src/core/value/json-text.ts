import type { ConfigValue } from "../../ports/value"

function write(value: ConfigValue, indent: string, current: string): string {
  switch (value.kind) {
    case "null":
      return "null"
    case "boolean":
    case "number":
    case "string":
      return JSON.stringify(value.value)
    case "sequence":
      return block(
        "[",
        "]",
        value.items.map((item) => (inner: string) => write(item, indent, inner)),
        indent,
        current,
      )
    case "mapping":
      return block(
        "{",
        "}",
        [...value.entries].map(
          ([key, item]) =>
            (inner: string) => `${JSON.stringify(key)}:${indent ? " " : ""}${write(item, indent, inner)}`,
        ),
        indent,
        current,
      )
  }
}

function block(
  open: string,
  close: string,
  parts: ((inner: string) => string)[],
  indent: string,
  current: string,
): string {
  if (parts.length === 0) return `${open}${close}`
  if (!indent) return `${open}${parts.map((part) => part("")).join(",")}${close}`

  const inner = current + indent
  return `${open}\n${parts.map((part) => inner + part(inner)).join(",\n")}\n${current}${close}`
}

/**
 * JSON text of a tree in its own key order. Matches `JSON.stringify(plain,
 * null, indent)`, which would move integer-like keys to the front.
 */
export function stringifyJson(value: ConfigValue, indent = 0): string {
  return write(value, " ".repeat(indent), "")
}
