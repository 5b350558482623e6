export { EnvKeySource } from "./adapters/env/env-key-source"
export type { EnvKeySourceOptions } from "./adapters/env/env-key-source"
export { FileKeySource } from "./adapters/file/file-key-source"
export type { FileKeySourceOptions } from "./adapters/file/file-key-source"
export { MemoryKeySource } from "./adapters/memory/memory-key-source"
export { PassphraseKeySource, SCRYPT_PARAMS } from "./adapters/passphrase/passphrase-key-source"
export type { PassphraseKeySourceOptions } from "./adapters/passphrase/passphrase-key-source"
export { assertKeyLength, decodeKey, encodeKey, generateKey, KEY_LENGTH } from "./core/key-codec"
export type { KeyEncoding } from "./core/key-codec"
export { KeyringError } from "./core/keyring-error"
export type { KeyringErrorCode } from "./core/keyring-error"
export { resolveKey } from "./core/resolve-key"
export type { ResolveKeyDeps } from "./core/resolve-key"
export type { KeySource, ResolvedKey } from "./ports/key-source"
