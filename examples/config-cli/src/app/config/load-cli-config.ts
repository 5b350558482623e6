import { DotenvSource, EnvSource, type EnvRecord, loadConfig, toPlain } from "@tessera/config"
import { BaseError } from "@tessera/errors"
import { type CliConfig, type EnvConfig, envSchema } from "./schema"

export const ENV_PREFIX = "TESSERA_"

export class CliConfigError extends BaseError<"invalid_cli_config"> {
  constructor(problems: readonly string[]) {
    super(`Invalid ${ENV_PREFIX}* settings:\n${problems.map((p) => `  - ${p}`).join("\n")}`, {
      code: "invalid_cli_config",
      context: { problems: [...problems] },
    })
  }
}

export function mapEnvToConfig(env: EnvConfig): CliConfig {
  return {
    logging: {
      level: env.log_level,
      prettify: env.log_pretty,
    },
    history: {
      file: env.history_file,
      lockTimeoutMs: env.lock_timeout_ms,
      lockTtlMs: env.lock_ttl_ms,
    },
    keys: {
      ...(env.key_file !== undefined && { file: env.key_file }),
    },
    sensitive: {
      paths: env.sensitive_paths,
      suffixes: env.sensitive_suffixes,
    },
  }
}

export type LoadedCliConfig = {
  config: CliConfig
  /** The process environment over the optional `.env` file. */
  env: EnvRecord
}

/**
 * Settings of the CLI itself, from `TESSERA_*` variables in the process
 * environment and in an optional `.env` file in `cwd`. The process wins.
 *
 * @throws CliConfigError
 */
export async function loadCliConfig(env: EnvRecord, cwd: string = process.cwd()): Promise<LoadedCliConfig> {
  const dotenv = new DotenvSource({ file: ".env", required: false, cwd, prefix: ENV_PREFIX })

  const loaded = await loadConfig({
    sources: [dotenv, new EnvSource({ env, prefix: ENV_PREFIX })],
    env: false,
  })

  const parsed = envSchema.safeParse(toPlain(loaded.value))
  if (!parsed.success) {
    throw new CliConfigError(
      parsed.error.issues.map((issue) => `${ENV_PREFIX}${issue.path.map(String).join("__").toUpperCase()}: ${issue.message}`),
    )
  }

  return {
    config: mapEnvToConfig(parsed.data),
    env: { ...(await dotenv.loadRecord()), ...env },
  }
}
