import type { ConfigFormat } from "../../ports/document"
import type { ConfigSource } from "../../ports/source"
import type { ConfigMapping } from "../../ports/value"
import { SourceNotFoundError } from "../../core/errors"
import { detectFormat } from "../../core/format/format-registry"
import { mapping } from "../../core/value/value"
import { readDocument } from "./read-document"

export interface FileSourceOptions {
  file: string
  /** A missing optional file contributes an empty mapping. */
  required: boolean
  /** Relative files resolve against this. Default: `process.cwd()` */
  cwd?: string
  /** Default: detected from the file extension */
  format?: ConfigFormat
}

export class FileSource implements ConfigSource {
  readonly name: string
  private readonly format: ConfigFormat

  constructor(private readonly options: FileSourceOptions) {
    this.format = options.format ?? detectFormat(options.file)
    this.name = `${this.format}:${options.file}`
  }

  async load(): Promise<ConfigMapping> {
    const { file, required, cwd } = this.options
    const doc = await readDocument(file, { format: this.format, ...(cwd && { cwd }) })

    if (doc) return doc.root
    if (required) throw SourceNotFoundError.file(file)
    return mapping()
  }
}
