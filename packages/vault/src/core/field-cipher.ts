import { createCipheriv, createDecipheriv, createHmac, hkdfSync, randomBytes, timingSafeEqual } from "node:crypto"
import { InvalidKeyError } from "./vault-error"

export const KEY_BYTES = 32
const NONCE_BYTES = 12
const TAG_BYTES = 16
const FINGERPRINT_BYTES = 16

export const TOKEN_PREFIX = "enc:v1:"
const AAD = Buffer.from("enc:v1")
const TOKEN = /^enc:v1:([A-Za-z0-9_-]+):([A-Za-z0-9_-]+):([A-Za-z0-9_-]+)$/

export type EncryptedParts = {
  nonce: Buffer
  /** Ciphertext followed by the GCM tag. */
  sealed: Buffer
  fingerprint: Buffer
}

/** Whether `value` is a well-formed encrypted token. Says nothing about the key. */
export function isEncryptedValue(value: string): boolean {
  return parseToken(value) !== undefined
}

/** @returns undefined when the token is not well formed */
export function parseToken(token: string): EncryptedParts | undefined {
  const match = TOKEN.exec(token)
  if (!match) return undefined

  const [, nonce = "", sealed = "", fingerprint = ""] = match
  const parts = {
    nonce: Buffer.from(nonce, "base64url"),
    sealed: Buffer.from(sealed, "base64url"),
    fingerprint: Buffer.from(fingerprint, "base64url"),
  }

  if (parts.nonce.length !== NONCE_BYTES || parts.sealed.length < TAG_BYTES) return undefined
  if (parts.fingerprint.length !== FINGERPRINT_BYTES) return undefined
  return parts
}

function formatToken({ nonce, sealed, fingerprint }: EncryptedParts): string {
  return `${TOKEN_PREFIX}${nonce.toString("base64url")}:${sealed.toString("base64url")}:${fingerprint.toString("base64url")}`
}

function derive(key: Buffer, info: string): Buffer {
  return Buffer.from(hkdfSync("sha256", key, Buffer.alloc(0), info, KEY_BYTES))
}

/**
 * AES-256-GCM over single string values, with subkeys derived from the
 * master key by HKDF-SHA-256 so the cipher and fingerprint keys differ.
 */
export class FieldCipher {
  private readonly encryptionKey: Buffer
  private readonly fingerprintKey: Buffer

  constructor(key: Buffer) {
    if (key.length !== KEY_BYTES) throw new InvalidKeyError(key.length)
    this.encryptionKey = derive(key, "tessera/v1/encrypt")
    this.fingerprintKey = derive(key, "tessera/v1/fingerprint")
  }

  encrypt(plaintext: string): string {
    const nonce = randomBytes(NONCE_BYTES)
    const cipher = createCipheriv("aes-256-gcm", this.encryptionKey, nonce, { authTagLength: TAG_BYTES })
    cipher.setAAD(AAD)

    const sealed = Buffer.concat([cipher.update(plaintext, "utf8"), cipher.final(), cipher.getAuthTag()])
    return formatToken({ nonce, sealed, fingerprint: this.fingerprint(plaintext) })
  }

  /** @returns undefined when authentication fails */
  decrypt(parts: EncryptedParts): string | undefined {
    const body = parts.sealed.subarray(0, parts.sealed.length - TAG_BYTES)
    const tag = parts.sealed.subarray(parts.sealed.length - TAG_BYTES)

    const decipher = createDecipheriv("aes-256-gcm", this.encryptionKey, parts.nonce, { authTagLength: TAG_BYTES })
    decipher.setAAD(AAD)
    decipher.setAuthTag(tag)

    let plaintext: string
    try {
      plaintext = Buffer.concat([decipher.update(body), decipher.final()]).toString("utf8")
    } catch {
      return undefined
    }

    return timingSafeEqual(this.fingerprint(plaintext), parts.fingerprint) ? plaintext : undefined
  }

  /** HMAC-SHA-256 of the plaintext, truncated. Equal plaintexts give equal fingerprints. */
  fingerprint(plaintext: string): Buffer {
    return createHmac("sha256", this.fingerprintKey).update(plaintext, "utf8").digest().subarray(0, FINGERPRINT_BYTES)
  }
}
