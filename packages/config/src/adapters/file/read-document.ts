import * as fs from "node:fs/promises"
import * as path from "node:path"
import type { ConfigDocument, ConfigFormat } from "../../ports/document"
import { detectFormat, parse } from "../../core/format/format-registry"

export function isNotFoundError(err: unknown): boolean {
  return err instanceof Error && Reflect.get(err, "code") === "ENOENT"
}

/**
 * Read and parse a configuration file, detecting the format from its
 * extension unless one is given. `origin` is the path as passed in.
 *
 * Resolves to `null` when the file does not exist.
 */
export async function readDocument(
  file: string,
  options: { format?: ConfigFormat; cwd?: string } = {},
): Promise<ConfigDocument | null> {
  const format = options.format ?? detectFormat(file)
  const resolved = path.resolve(options.cwd ?? process.cwd(), file)

  let text: string
  try {
    text = await fs.readFile(resolved, "utf8")
  } catch (err) {
    if (isNotFoundError(err)) return null
    throw err
  }

  return parse(text, format, file)
}
