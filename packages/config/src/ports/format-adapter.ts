import type { ConfigFormat } from "./document"
import type { ConfigMapping } from "./value"

/**
 * Codec between one serialization format and plain JavaScript values.
 *
 * Adapters own their format's narrowing rules; everything past `decode`
 * works on ConfigValue trees only.
 */
export interface FormatAdapter {
  readonly format: ConfigFormat

  /** File extensions, lowercase with the leading dot. */
  readonly extensions: readonly string[]

  /**
   * Parse text into plain values.
   *
   * @throws ParseError with code `syntax_error` for malformed text
   */
  decode(text: string, origin: string): unknown

  /**
   * Render a tree. Same tree, same bytes.
   *
   * @throws SerializeError when the tree cannot be expressed in this format
   */
  encode(root: ConfigMapping): string
}
