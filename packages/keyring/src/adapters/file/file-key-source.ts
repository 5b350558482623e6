import { readFile } from "node:fs/promises"
import { decodeKey, KEY_LENGTH } from "../../core/key-codec"
import type { KeySource } from "../../ports/key-source"

export type FileKeySourceOptions = {
  path: string

  /**
   * Throw instead of returning `null` when the file does not exist.
   * @default false
   */
  required?: boolean
}

function isNotFoundError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

/**
 * Key file holding either the raw 32 bytes or their hex/base64 text.
 */
export class FileKeySource implements KeySource {
  readonly name: string

  constructor(private readonly options: FileKeySourceOptions) {
    this.name = `file:${options.path}`
  }

  async load(): Promise<Buffer | null> {
    let bytes: Buffer
    try {
      bytes = await readFile(this.options.path)
    } catch (err) {
      if (isNotFoundError(err) && !this.options.required) return null
      throw err
    }

    if (bytes.length === KEY_LENGTH) return bytes
    return decodeKey(bytes.toString("utf8"), this.name)
  }
}
