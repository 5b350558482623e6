import * as fs from "node:fs/promises"
import * as path from "node:path"
import { parse } from "dotenv"
import type { EnvRecord } from "../../ports/env"
import type { ConfigSource } from "../../ports/source"
import type { ConfigMapping } from "../../ports/value"
import { SourceNotFoundError } from "../../core/errors"
import { isNotFoundError } from "../file/read-document"
import { EnvSource } from "../env/env-source"

export interface DotenvSourceOptions {
  file: string
  required: boolean
  cwd?: string
  /** Same meaning as for EnvSource. */
  prefix?: string
  separator?: string
}

/**
 * A `.env` file. `loadRecord()` gives the raw variables for placeholder
 * lookups; `load()` gives them as a tree the way EnvSource does.
 *
 * The file is never written into `process.env`.
 */
export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly options: DotenvSourceOptions) {
    this.name = `dotenv:${options.file}`
  }

  async loadRecord(): Promise<EnvRecord> {
    const { file, required, cwd } = this.options
    const resolved = path.resolve(cwd ?? process.cwd(), file)

    try {
      return parse(await fs.readFile(resolved))
    } catch (err) {
      if (!isNotFoundError(err)) throw err
      if (required) throw SourceNotFoundError.file(file)
      return {}
    }
  }

  async load(): Promise<ConfigMapping> {
    const { prefix, separator } = this.options
    const env = await this.loadRecord()
    return new EnvSource({ env, ...(prefix && { prefix }), ...(separator && { separator }) }).load()
  }
}
