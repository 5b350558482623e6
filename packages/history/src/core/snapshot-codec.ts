import { type ConfigDocument, contentHash, parse, ParseError, stringifyJson } from "@tessera/config"
import { z } from "zod"
import type { VersionSnapshot } from "../ports/snapshot"

/** Everything but the tree, which is read as a ConfigValue to keep its keys as written. */
const header = z.object({
  seq: z.number().int().positive(),
  hash: z.string().regex(/^[0-9a-f]{64}$/),
  timestamp: z.iso.datetime(),
  author: z.string().optional(),
  sources: z.array(z.string()),
})

export type DecodeResult =
  | { ok: true; snapshot: VersionSnapshot }
  | { ok: false; reason: "malformed_record" | "hash_mismatch"; detail: string }

/** One JSON line. Keys in a fixed order so equal snapshots give equal lines. */
export function encodeSnapshot(snapshot: VersionSnapshot): string {
  const head = JSON.stringify({
    seq: snapshot.seq,
    hash: snapshot.hash,
    timestamp: snapshot.timestamp,
    ...(snapshot.author !== undefined && { author: snapshot.author }),
    sources: snapshot.sources,
  })
  return `${head.slice(0, -1)},"tree":${stringifyJson(snapshot.tree)}}`
}

export function decodeSnapshot(line: string): DecodeResult {
  let raw: unknown
  try {
    raw = JSON.parse(line)
  } catch (err) {
    return { ok: false, reason: "malformed_record", detail: err instanceof Error ? err.message : String(err) }
  }

  const parsed = header.safeParse(raw)
  if (!parsed.success) {
    return { ok: false, reason: "malformed_record", detail: z.prettifyError(parsed.error).replaceAll("\n", "; ") }
  }

  let doc: ConfigDocument
  try {
    doc = parse(line, "json", "snapshot")
  } catch (err) {
    if (err instanceof ParseError) return { ok: false, reason: "malformed_record", detail: err.message }
    throw err
  }
  const tree = doc.root.entries.get("tree")
  if (tree === undefined) return { ok: false, reason: "malformed_record", detail: "tree is missing" }
  if (tree.kind !== "mapping") return { ok: false, reason: "malformed_record", detail: "tree is not a mapping" }

  if (contentHash(tree) !== parsed.data.hash) {
    return { ok: false, reason: "hash_mismatch", detail: `hash does not match the tree of snapshot ${parsed.data.seq}` }
  }

  const { seq, hash, timestamp, author, sources } = parsed.data
  return {
    ok: true,
    snapshot: Object.freeze({
      seq,
      hash,
      timestamp,
      tree,
      sources: Object.freeze(sources),
      ...(author !== undefined && { author }),
    }),
  }
}
