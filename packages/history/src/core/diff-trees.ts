import { type ConfigValue, type FieldPath, formatPath, valuesEqual } from "@tessera/config"
import { fingerprintOf, type SensitiveMarker } from "@tessera/vault"
import type { FieldDelta } from "../ports/snapshot"

const nothingSensitive: SensitiveMarker = { matches: () => false }

function sensitiveEqual(a: ConfigValue, b: ConfigValue): boolean {
  const fa = fingerprintOf(a)
  const fb = fingerprintOf(b)
  if (fa !== undefined && fb !== undefined) return fa === fb
  return valuesEqual(a, b)
}

function diffNode(
  a: ConfigValue,
  b: ConfigValue,
  path: FieldPath,
  markers: SensitiveMarker,
  out: FieldDelta[],
): void {
  if (markers.matches(path)) {
    if (!sensitiveEqual(a, b)) out.push({ path: formatPath(path), kind: "changed", sensitive: true })
    return
  }

  if (a.kind === "mapping" && b.kind === "mapping") {
    for (const [key, before] of a.entries) {
      const childPath = [...path, key]
      const after = b.entries.get(key)
      if (after === undefined) out.push(delta(childPath, "removed", before, undefined, markers))
      else diffNode(before, after, childPath, markers, out)
    }
    for (const [key, after] of b.entries) {
      if (!a.entries.has(key)) out.push(delta([...path, key], "added", undefined, after, markers))
    }
    return
  }

  if (!valuesEqual(a, b)) out.push(delta(path, "changed", a, b, markers))
}

function delta(
  path: FieldPath,
  kind: FieldDelta["kind"],
  before: ConfigValue | undefined,
  after: ConfigValue | undefined,
  markers: SensitiveMarker,
): FieldDelta {
  if (containsSensitive(path, before, markers) || containsSensitive(path, after, markers)) {
    return { path: formatPath(path), kind, sensitive: true }
  }
  return {
    path: formatPath(path),
    kind,
    ...(before !== undefined && { before }),
    ...(after !== undefined && { after }),
  }
}

function containsSensitive(path: FieldPath, value: ConfigValue | undefined, markers: SensitiveMarker): boolean {
  if (markers.matches(path)) return true
  if (value?.kind === "mapping") {
    for (const [key, child] of value.entries) if (containsSensitive([...path, key], child, markers)) return true
  }
  if (value?.kind === "sequence") {
    for (const [i, child] of value.items.entries()) if (containsSensitive([...path, i], child, markers)) return true
  }
  return false
}

/**
 * Field-level differences between two trees, each reported once at the
 * highest node that differs. Mappings are compared key by key; any other
 * change, including a change of kind, is one `changed` delta.
 *
 * Sensitive fields are compared by fingerprint and never carry values;
 * neither does any delta whose old or new side contains one.
 */
export function diffTrees(a: ConfigValue, b: ConfigValue, markers: SensitiveMarker = nothingSensitive): FieldDelta[] {
  const out: FieldDelta[] = []
  diffNode(a, b, [], markers, out)
  return out
}
