import type { Logger } from "@tessera/logger"
import { mock } from "vitest-mock-extended"
import { MemoryKeySource } from "../../adapters/memory/memory-key-source"
import type { KeySource } from "../../ports/key-source"
import { resolveKey } from "../resolve-key"

describe("resolveKey", () => {
  it("returns the first configured key and its source", async () => {
    const logger = mock<Logger>()
    const sources = [
      new MemoryKeySource(null, "env:TESSERA_KEY"),
      new MemoryKeySource(Buffer.alloc(32, 1), "file:vault.key"),
      new MemoryKeySource(Buffer.alloc(32, 2), "passphrase:TESSERA_PASSPHRASE"),
    ]

    const resolved = await resolveKey(sources, { logger })

    expect(resolved).toEqual({ key: Buffer.alloc(32, 1), source: "file:vault.key" })
    expect(logger.debug).toHaveBeenCalledWith("encryption key resolved", { source: "file:vault.key" })
  })

  it("does not consult later sources once a key is found", async () => {
    const later = mock<KeySource>()

    await resolveKey([new MemoryKeySource(Buffer.alloc(32)), later])

    expect(later.load).not.toHaveBeenCalled()
  })

  it("names every source it tried when none has a key", async () => {
    const sources = [new MemoryKeySource(null, "env:TESSERA_KEY"), new MemoryKeySource(null, "file:vault.key")]

    await expect(resolveKey(sources)).rejects.toMatchObject({
      code: "key_not_found",
      message: "No encryption key found (tried env:TESSERA_KEY, file:vault.key)",
    })
  })

  it("rejects a source that yields a key of the wrong length", async () => {
    await expect(resolveKey([new MemoryKeySource(Buffer.alloc(16), "odd")])).rejects.toMatchObject({
      code: "invalid_key",
      context: { source: "odd" },
    })
  })
})
