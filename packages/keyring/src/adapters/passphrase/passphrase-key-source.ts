import { scrypt } from "node:crypto"
import { KEY_LENGTH } from "../../core/key-codec"
import { KeyringError } from "../../core/keyring-error"
import type { KeySource } from "../../ports/key-source"

export type PassphraseKeySourceOptions = {
  /** @default "TESSERA_PASSPHRASE" */
  variable?: string

  /** Fixed salt. Takes precedence over `saltVariable`. */
  salt?: string

  /** @default "TESSERA_KEY_SALT" */
  saltVariable?: string

  env?: Record<string, string | undefined>
}

export const SCRYPT_PARAMS = { N: 2 ** 14, r: 8, p: 1 } as const

function deriveKey(passphrase: string, salt: string): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(passphrase, salt, KEY_LENGTH, SCRYPT_PARAMS, (err, key) => {
      if (err) reject(err)
      else resolve(key)
    })
  })
}

/** Derives the key from a passphrase with scrypt. The same salt yields the same key. */
export class PassphraseKeySource implements KeySource {
  readonly name: string
  private readonly variable: string
  private readonly env: Record<string, string | undefined>

  constructor(private readonly options: PassphraseKeySourceOptions = {}) {
    this.variable = options.variable ?? "TESSERA_PASSPHRASE"
    this.env = options.env ?? process.env
    this.name = `passphrase:${this.variable}`
  }

  async load(): Promise<Buffer | null> {
    const passphrase = this.env[this.variable]
    if (!passphrase) return null

    const salt = this.options.salt ?? this.env[this.options.saltVariable ?? "TESSERA_KEY_SALT"]
    if (!salt) throw KeyringError.missingSalt(this.name)

    return deriveKey(passphrase, salt)
  }
}
