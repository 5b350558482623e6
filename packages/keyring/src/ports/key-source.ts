/**
 * Somewhere the symmetric vault key can come from.
 *
 * Sources never read the configuration being protected.
 */
export interface KeySource {
  /** Identifies the source in logs and errors, e.g. `env:TESSERA_KEY`. */
  readonly name: string

  /**
   * @returns the 32-byte key, or `null` when this source is not configured.
   * @throws KeyringError when the source is configured but its key is malformed.
   */
  load(): Promise<Buffer | null>
}

export type ResolvedKey = {
  key: Buffer
  source: string
}
