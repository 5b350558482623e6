import type { KeySource } from "../../ports/key-source"

export class MemoryKeySource implements KeySource {
  constructor(
    private readonly key: Buffer | null,
    readonly name: string = "memory",
  ) {}

  async load(): Promise<Buffer | null> {
    return this.key ? Buffer.from(this.key) : null
  }
}
