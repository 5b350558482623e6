import { BaseError } from "@tessera/errors"

export type KeyringErrorCode = "key_not_found" | "invalid_key" | "missing_salt"

export class KeyringError extends BaseError<KeyringErrorCode> {
  static notFound(sources: readonly string[]): KeyringError {
    return new KeyringError(
      sources.length
        ? `No encryption key found (tried ${sources.join(", ")})`
        : "No encryption key sources configured",
      { code: "key_not_found", context: { sources: [...sources] } },
    )
  }

  static invalidKey(source: string, reason: string): KeyringError {
    return new KeyringError(`Invalid key from ${source}: ${reason}`, {
      code: "invalid_key",
      context: { source, reason },
    })
  }

  static missingSalt(source: string): KeyringError {
    return new KeyringError(`${source} needs a salt to derive a key from the passphrase`, {
      code: "missing_salt",
      context: { source },
    })
  }
}
