import path from "node:path"
import { type Clock, SystemClock } from "@tessera/clock"
import type { EnvRecord } from "@tessera/config"
import { type ConfigHistory, type ConfigHistoryOptions, openFileHistory } from "@tessera/history"
import { EnvKeySource, FileKeySource, type KeySource, PassphraseKeySource } from "@tessera/keyring"
import { type Logger, PinoLogger } from "@tessera/logger"
import { SensitiveFields } from "@tessera/vault"
import type { CliConfig } from "./config/schema"
import { loadCliConfig } from "./config/load-cli-config"

export type Output = {
  stdout: (text: string) => void
  stderr: (text: string) => void
}

export type CliContextOptions = {
  env?: EnvRecord
  cwd?: string
  output?: Output
  logger?: Logger
  clock?: Clock
}

export type HistoryOverrides = Partial<Pick<ConfigHistoryOptions, "schema" | "strict" | "sensitive" | "encryptionKey">>

export type CliContext = {
  config: CliConfig
  /** The process environment over the optional `.env` file. */
  env: EnvRecord
  cwd: string
  output: Output
  logger: Logger
  clock: Clock
  sensitive: SensitiveFields
  keySources: () => KeySource[]
  openHistory: (options?: HistoryOverrides) => ConfigHistory
}

export const processOutput: Output = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
}

/**
 * Everything commands need, built once per invocation. `--sensitive` paths
 * given on the command line are added to the configured ones by the caller.
 */
export async function createCliContext(options: CliContextOptions = {}): Promise<CliContext> {
  const cwd = options.cwd ?? process.cwd()
  const { config, env } = await loadCliConfig(options.env ?? process.env, cwd)

  const logger =
    options.logger ??
    new PinoLogger(
      { destination: process.stderr },
      { level: config.logging.level, prettify: config.logging.prettify, redact: ["key", "passphrase"] },
      { service: "tessera" },
    )
  const clock = options.clock ?? new SystemClock()
  const sensitive = new SensitiveFields({ paths: config.sensitive.paths, suffixes: config.sensitive.suffixes })

  return {
    config,
    env,
    cwd,
    output: options.output ?? processOutput,
    logger,
    clock,
    sensitive,
    keySources: () => [
      new EnvKeySource({ env }),
      ...(config.keys.file ? [new FileKeySource({ path: path.resolve(cwd, config.keys.file), required: true })] : []),
      new PassphraseKeySource({ env }),
    ],
    openHistory: (opts = {}) =>
      openFileHistory(
        { clock, logger },
        {
          file: path.resolve(cwd, config.history.file),
          lockTtlMs: config.history.lockTtlMs,
          lockTimeoutMs: config.history.lockTimeoutMs,
          sensitive,
          ...opts,
        },
      ),
  }
}
