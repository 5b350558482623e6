function getCause(v: unknown): unknown {
  return typeof v === "object" && v !== null && "cause" in v ? v.cause : undefined
}

/**
 * Walk the `cause` links of a thrown value, outermost first.
 *
 * Stops at `maxDepth` entries or when a value repeats.
 */
export function errorChain(err: unknown, maxDepth: number = 50): unknown[] {
  const chain: unknown[] = []
  const seen = new WeakSet<object>()

  let current: unknown = err

  while (current != null && chain.length < maxDepth) {
    if (typeof current === "object") {
      if (seen.has(current)) break
      seen.add(current)
    }

    chain.push(current)

    const next = getCause(current)
    if (next === undefined) break
    current = next
  }

  return chain
}

/**
 * One-line description of an error and its causes.
 *
 * @example
 * ```ts
 * describeError(new ParseError(..., { cause: syntaxError }))
 * // "settings.yaml: invalid YAML at line 3 <- Nested mappings are not allowed"
 * ```
 */
export function describeError(err: unknown, separator: string = " <- "): string {
  return errorChain(err)
    .map((e) => (e instanceof Error ? e.message : String(e)))
    .join(separator)
}
