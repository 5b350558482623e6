export { FieldCipher, isEncryptedValue, KEY_BYTES, TOKEN_PREFIX } from "./core/field-cipher"
export { DEFAULT_SENSITIVE_SUFFIXES, SensitiveFields } from "./core/sensitive-fields"
export type { SensitiveFieldsOptions } from "./core/sensitive-fields"
export { decryptFields, encryptFields, fingerprintOf, maskFields, plaintextSecrets } from "./core/vault"
export { DecryptionError, InvalidKeyError } from "./core/vault-error"
export type { DecryptionErrorCode } from "./core/vault-error"
export type { SensitiveMarker } from "./ports/sensitive"
