import type { ParseLocation } from "../errors"

/** Line and column of a character offset, both 1-based. */
export function locate(text: string, offset: number): ParseLocation {
  const before = text.slice(0, offset)
  const line = before.split("\n").length
  const column = offset - before.lastIndexOf("\n")
  return { line, column }
}
