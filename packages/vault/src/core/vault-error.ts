import { BaseError } from "@tessera/errors"

export type DecryptionErrorCode = "decryption_failed" | "malformed_ciphertext"

/** Messages name the field only; neither ciphertext nor plaintext is included. */
export class DecryptionError extends BaseError<DecryptionErrorCode> {
  static authenticationFailed(path: string): DecryptionError {
    return new DecryptionError(`Cannot decrypt ${path}: wrong key or tampered value`, {
      code: "decryption_failed",
      context: { path },
    })
  }

  static malformed(path: string, reason: string): DecryptionError {
    return new DecryptionError(`Cannot decrypt ${path}: ${reason}`, {
      code: "malformed_ciphertext",
      context: { path, reason },
    })
  }

  get path(): string {
    return String(this.context.path)
  }
}

export class InvalidKeyError extends BaseError<"invalid_key"> {
  constructor(length: number) {
    super(`Encryption keys must be 32 bytes, got ${length}`, {
      code: "invalid_key",
      context: { length },
    })
  }
}
