import { randomBytes } from "node:crypto"
import { KeyringError } from "./keyring-error"

export const KEY_LENGTH = 32

export type KeyEncoding = "base64" | "base64url" | "hex"

const HEX_KEY = /^[0-9a-fA-F]{64}$/
const BASE64_KEY = /^[A-Za-z0-9+/_-]{43}={0,1}$/

/** Decode a 32-byte key written as 64 hex digits or as (url-safe) base64. */
export function decodeKey(text: string, source: string): Buffer {
  const trimmed = text.trim()

  if (HEX_KEY.test(trimmed)) return Buffer.from(trimmed, "hex")

  if (BASE64_KEY.test(trimmed)) {
    const key = Buffer.from(trimmed.replace(/-/g, "+").replace(/_/g, "/"), "base64")
    if (key.length === KEY_LENGTH) return key
  }

  throw KeyringError.invalidKey(source, `expected ${KEY_LENGTH} bytes as 64 hex digits or base64`)
}

export function encodeKey(key: Buffer, encoding: KeyEncoding = "base64"): string {
  assertKeyLength(key, "key")
  return key.toString(encoding)
}

export function generateKey(): Buffer {
  return randomBytes(KEY_LENGTH)
}

export function assertKeyLength(key: Buffer, source: string): void {
  if (key.length !== KEY_LENGTH) {
    throw KeyringError.invalidKey(source, `expected ${KEY_LENGTH} bytes, got ${key.length}`)
  }
}
