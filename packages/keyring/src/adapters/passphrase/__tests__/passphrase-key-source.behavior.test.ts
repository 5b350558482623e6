import { PassphraseKeySource } from "../passphrase-key-source"

describe("PassphraseKeySource behavior", () => {
  it("returns null without a passphrase", async () => {
    expect(await new PassphraseKeySource({ env: {} }).load()).toBeNull()
  })

  it("derives a stable 32-byte key from passphrase and salt", async () => {
    const env = { TESSERA_PASSPHRASE: "correct horse", TESSERA_KEY_SALT: "test-salt" }

    const a = await new PassphraseKeySource({ env }).load()
    const b = await new PassphraseKeySource({ env }).load()

    expect(a?.length).toBe(32)
    expect(a).toEqual(b)
  })

  it("derives different keys for different salts", async () => {
    const env = { TESSERA_PASSPHRASE: "correct horse" }

    const a = await new PassphraseKeySource({ env, salt: "salt-a" }).load()
    const b = await new PassphraseKeySource({ env, salt: "salt-b" }).load()

    expect(a?.equals(b ?? Buffer.alloc(0))).toBe(false)
  })

  it("requires a salt once a passphrase is set", async () => {
    const source = new PassphraseKeySource({ env: { TESSERA_PASSPHRASE: "correct horse" } })

    await expect(source.load()).rejects.toMatchObject({
      code: "missing_salt",
      context: { source: "passphrase:TESSERA_PASSPHRASE" },
    })
  })
})
