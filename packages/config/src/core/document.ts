import type { ConfigDocument, ConfigFormat } from "../ports/document"
import type { ConfigMapping } from "../ports/value"

export function createDocument(root: ConfigMapping, format: ConfigFormat, origin: string): ConfigDocument {
  return Object.freeze({ root, format, origin })
}

/** New document with `root` replaced. The original is left untouched. */
export function withRoot(doc: ConfigDocument, root: ConfigMapping): ConfigDocument {
  return createDocument(root, doc.format, doc.origin)
}
