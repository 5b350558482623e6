import type { Milliseconds } from "@tessera/clock"
import { type LogLevelName, logLevelNames } from "@tessera/logger"
import { z } from "zod/mini"

const list = z.pipe(
  z.string(),
  z.transform((raw) =>
    raw
      .split(",")
      .map((s) => s.trim())
      .filter((s) => s !== ""),
  ),
)

/** `TESSERA_*` variables with the prefix removed and names lowercased. */
export const envSchema = z.object({
  log_level: z._default(z.enum(logLevelNames), "warn"),
  log_pretty: z._default(z.stringbool(), false),

  history_file: z._default(z.string(), ".tessera/history.jsonl"),
  lock_timeout_ms: z._default(z.coerce.number(), 5_000),
  lock_ttl_ms: z._default(z.coerce.number(), 30_000),

  key_file: z.optional(z.string()),

  sensitive_paths: z._default(list, []),
  sensitive_suffixes: z._default(list, ["_secret"]),
})

export type EnvConfig = z.infer<typeof envSchema>

export type CliConfig = {
  logging: {
    level: LogLevelName
    prettify: boolean
  }

  history: {
    file: string
    lockTimeoutMs: Milliseconds
    lockTtlMs: Milliseconds
  }

  keys: {
    file?: string
  }

  sensitive: {
    paths: string[]
    suffixes: string[]
  }
}
