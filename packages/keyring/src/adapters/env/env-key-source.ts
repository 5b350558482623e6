import { decodeKey } from "../../core/key-codec"
import type { KeySource } from "../../ports/key-source"

export type EnvKeySourceOptions = {
  /** @default "TESSERA_KEY" */
  variable?: string

  /** Defaults to `process.env`. */
  env?: Record<string, string | undefined>
}

/** Key held in an environment variable as hex or base64. */
export class EnvKeySource implements KeySource {
  readonly name: string
  private readonly variable: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvKeySourceOptions = {}) {
    this.variable = options.variable ?? "TESSERA_KEY"
    this.env = options.env ?? process.env
    this.name = `env:${this.variable}`
  }

  async load(): Promise<Buffer | null> {
    const raw = this.env[this.variable]
    if (raw === undefined || raw.trim() === "") return null

    return decodeKey(raw, this.name)
  }
}
