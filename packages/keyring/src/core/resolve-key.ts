import { type Logger, NullLogger } from "@tessera/logger"
import type { KeySource, ResolvedKey } from "../ports/key-source"
import { assertKeyLength } from "./key-codec"
import { KeyringError } from "./keyring-error"

export type ResolveKeyDeps = {
  logger?: Logger
}

/**
 * First key offered by `sources`, in order.
 *
 * @throws KeyringError `key_not_found` when no source is configured
 */
export async function resolveKey(
  sources: readonly KeySource[],
  deps: ResolveKeyDeps = {},
): Promise<ResolvedKey> {
  const logger = deps.logger ?? new NullLogger()

  for (const source of sources) {
    const key = await source.load()
    if (key === null) continue

    assertKeyLength(key, source.name)
    logger.debug("encryption key resolved", { source: source.name })
    return { key, source: source.name }
  }

  throw KeyringError.notFound(sources.map((s) => s.name))
}
