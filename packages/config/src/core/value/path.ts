import type { FieldPath, PathSegment } from "../../ports/path"
import type { ConfigValue } from "../../ports/value"

const BARE_KEY = /^[A-Za-z_*][A-Za-z0-9_-]*$/

/**
 * Dotted form of a path: `db.host`, `servers[0].name`, `labels["app.kubernetes.io/name"]`.
 * The root is `""`.
 */
export function formatPath(path: FieldPath): string {
  let out = ""
  for (const segment of path) {
    if (typeof segment === "number") out += `[${segment}]`
    else if (BARE_KEY.test(segment)) out += out ? `.${segment}` : segment
    else out += `[${JSON.stringify(segment)}]`
  }
  return out
}

/**
 * Inverse of `formatPath`. Bare `*` segments are kept as wildcards.
 *
 * @throws SyntaxError for unbalanced brackets or empty segments
 */
export function parsePath(text: string): PathSegment[] {
  const segments: PathSegment[] = []
  let i = 0
  let expectKey = true

  const fail = (reason: string): never => {
    throw new SyntaxError(`Invalid path "${text}": ${reason}`)
  }

  while (i < text.length) {
    const ch = text[i]

    if (ch === "[") {
      const close = text.indexOf("]", i)
      if (close < 0) fail("unclosed bracket")
      const inner = text.slice(i + 1, close)

      if (/^\d+$/.test(inner)) {
        segments.push(Number(inner))
      } else if (inner.startsWith('"')) {
        const end = findClosingQuote(text, i + 1)
        if (end < 0 || text[end + 1] !== "]") fail("unterminated quoted key")
        const parsed: unknown = JSON.parse(text.slice(i + 1, end + 1))
        if (typeof parsed !== "string") fail("quoted key must be a string")
        segments.push(String(parsed))
        i = end + 2
        expectKey = false
        continue
      } else {
        fail(`unexpected "${inner}" in brackets`)
      }

      i = close + 1
      expectKey = false
      continue
    }

    if (ch === ".") {
      if (expectKey) fail("empty segment")
      expectKey = true
      i++
      continue
    }

    let end = i
    while (end < text.length && text[end] !== "." && text[end] !== "[") end++
    segments.push(text.slice(i, end))
    i = end
    expectKey = false
  }

  if (expectKey && text.length > 0) fail("empty segment")
  return segments
}

function findClosingQuote(text: string, start: number): number {
  for (let i = start + 1; i < text.length; i++) {
    if (text[i] === "\\") i++
    else if (text[i] === '"') return i
  }
  return -1
}

export function toFieldPath(path: string | FieldPath): FieldPath {
  return typeof path === "string" ? parsePath(path) : path
}

export function getAtPath(value: ConfigValue, path: string | FieldPath): ConfigValue | undefined {
  let current: ConfigValue | undefined = value

  for (const segment of toFieldPath(path)) {
    if (current === undefined) return undefined

    if (typeof segment === "number") {
      current = current.kind === "sequence" ? current.items[segment] : undefined
    } else {
      current = current.kind === "mapping" ? current.entries.get(segment) : undefined
    }
  }

  return current
}

/**
 * Whether `path` matches `pattern`, where a `*` pattern segment matches any
 * single key or index.
 */
export function matchesPattern(path: FieldPath, pattern: FieldPath): boolean {
  if (path.length !== pattern.length) return false
  return pattern.every((segment, i) => segment === "*" || segment === path[i])
}
