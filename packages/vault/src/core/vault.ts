import {
  configString,
  type ConfigMapping,
  type ConfigValue,
  type FieldPath,
  formatPath,
  mapLeaves,
  walk,
} from "@tessera/config"
import { REDACTED } from "@tessera/errors"
import type { SensitiveMarker } from "../ports/sensitive"
import { FieldCipher, isEncryptedValue, parseToken, TOKEN_PREFIX } from "./field-cipher"
import { DecryptionError } from "./vault-error"

function cipherFor(key: Buffer | FieldCipher): FieldCipher {
  return key instanceof FieldCipher ? key : new FieldCipher(key)
}

function rewriteSensitive(
  value: ConfigMapping,
  markers: SensitiveMarker,
  fn: (text: string, path: FieldPath) => string,
): ConfigMapping {
  const next = mapLeaves(value, (leaf, path) => {
    if (leaf.kind !== "string" || !markers.matches(path)) return leaf
    const text = fn(leaf.value, path)
    return text === leaf.value ? leaf : configString(text)
  })
  return next.kind === "mapping" ? next : value
}

/**
 * Encrypt every marked string field. Fields that already hold a value
 * sealed under this key are left as they are, so encrypting twice changes
 * nothing. Anything else is encrypted, including text that only looks like
 * a token and tokens sealed under another key.
 *
 * @throws InvalidKeyError
 */
export function encryptFields(value: ConfigMapping, markers: SensitiveMarker, key: Buffer | FieldCipher): ConfigMapping {
  const cipher = cipherFor(key)
  return rewriteSensitive(value, markers, (text) => (sealedBy(cipher, text) ? text : cipher.encrypt(text)))
}

function sealedBy(cipher: FieldCipher, text: string): boolean {
  const parts = parseToken(text)
  return parts !== undefined && cipher.decrypt(parts) !== undefined
}

/**
 * Decrypt every marked field holding an encrypted value. Marked fields in
 * plaintext are returned unchanged.
 *
 * @throws DecryptionError naming the first field that fails
 * @throws InvalidKeyError
 */
export function decryptFields(value: ConfigMapping, markers: SensitiveMarker, key: Buffer | FieldCipher): ConfigMapping {
  const cipher = cipherFor(key)

  return rewriteSensitive(value, markers, (text, path) => {
    if (!text.startsWith(TOKEN_PREFIX)) return text

    const parts = parseToken(text)
    if (!parts) throw DecryptionError.malformed(formatPath(path), "not a valid encrypted value")

    const plaintext = cipher.decrypt(parts)
    if (plaintext === undefined) throw DecryptionError.authenticationFailed(formatPath(path))
    return plaintext
  })
}

/** Fingerprint part of an encrypted value, or undefined for anything else. */
export function fingerprintOf(value: ConfigValue): string | undefined {
  if (value.kind !== "string") return undefined
  const parts = parseToken(value.value)
  return parts?.fingerprint.toString("base64url")
}

/** Replace every marked string field, encrypted or not, with `"[redacted]"`. */
export function maskFields(value: ConfigMapping, markers: SensitiveMarker): ConfigMapping {
  return rewriteSensitive(value, markers, () => REDACTED)
}

/** Dotted paths of marked string fields that are not encrypted. */
export function plaintextSecrets(value: ConfigMapping, markers: SensitiveMarker): string[] {
  const found: string[] = []
  for (const [path, node] of walk(value)) {
    if (node.kind === "string" && markers.matches(path) && !isEncryptedValue(node.value)) found.push(formatPath(path))
  }
  return found
}
