import { type Clock, SystemClock } from "@tessera/clock"
import { createNullLogger, type Logger } from "@tessera/logger"
import type { EnvLookup } from "../../ports/env"
import type { MergeOptions, MergeResult, MergeSource } from "../../ports/merge"
import type { FieldPath } from "../../ports/path"
import type { Schema } from "../../ports/schema"
import type { ConfigSource } from "../../ports/source"
import { envLookup } from "../env/env-lookup"
import { resolveEnv } from "../env/resolve-env"
import { ValidationFailedError } from "../errors"
import { merge } from "../merge/merge"
import { applyDefaults } from "../schema/defaults"
import { validate } from "../schema/validate"
import { Config } from "./config"

export type LoadConfigOptions = {
  /** Lowest precedence first. */
  sources: readonly ConfigSource[]
  schema?: Schema
  /**
   * Reject keys the schema does not declare. When false they are kept and
   * listed by `unknownKeys()`. Default: `schema.strict`
   */
  strict?: boolean
  /** Lookup for `${VAR}` placeholders, or `false` to leave them as text. Default: `process.env` */
  env?: EnvLookup | false
  merge?: MergeOptions
  /** Fields whose values must not appear in validation messages. */
  isSensitive?: (path: FieldPath) => boolean
  logger?: Logger
  /** Times the load for the summary log. Default: `SystemClock` */
  clock?: Clock
}

export type MergeSourcesOptions = Pick<LoadConfigOptions, "sources" | "env" | "merge" | "logger">

/**
 * Load every source, resolve placeholders per source and merge, without
 * schema checks.
 *
 * @throws UnresolvedReferenceError, ParseError, SourceNotFoundError from the sources
 */
export async function mergeSources(options: MergeSourcesOptions): Promise<MergeResult> {
  const logger = (options.logger ?? createNullLogger()).child({ module: "config", operation: "load" })
  const lookup = options.env ?? envLookup(process.env)

  const layers: MergeSource[] = []
  for (const source of options.sources) {
    const raw = await source.load()
    const value = lookup ? resolveEnv(raw, lookup, { origin: source.name }) : raw
    layers.push({ name: source.name, value })
    logger.debug("source loaded", { source: source.name, keys: value.entries.size })
  }

  const merged = merge(layers, options.merge)
  for (const conflict of merged.conflicts) {
    logger.debug("merge conflict", { path: conflict.path, kind: conflict.kind, winner: conflict.winner })
  }
  return merged
}

/**
 * Load every source, resolve placeholders per source, merge, fill schema
 * defaults and validate.
 *
 * @throws ValidationFailedError with every field error found
 * @throws UnresolvedReferenceError, ParseError, SourceNotFoundError from the sources
 */
export async function loadConfig(options: LoadConfigOptions): Promise<Config> {
  const logger = (options.logger ?? createNullLogger()).child({ module: "config", operation: "load" })
  const clock = options.clock ?? new SystemClock()
  const startedAt = clock.nowMs()

  const merged = await mergeSources(options)

  const config = options.schema
    ? checked(merged, options.schema, options, logger)
    : new Config({ value: merged.value, merge: merged })

  logger.info("configuration loaded", {
    sources: merged.sources.length,
    conflicts: merged.conflicts.length,
    durationMs: clock.nowMs() - startedAt,
  })

  return config
}

function checked(merged: MergeResult, schema: Schema, options: LoadConfigOptions, logger: Logger): Config {
  const { value, applied } = applyDefaults(merged.value, schema)
  const strict = options.strict ?? schema.strict
  const result = validate(value, schema, {
    strict: true,
    ...(options.isSensitive && { isSensitive: options.isSensitive }),
  })

  const unknownKeys = result.errors.filter((e) => e.code === "unknown_field").map((e) => e.path)
  const errors = strict ? result.errors : result.errors.filter((e) => e.code !== "unknown_field")

  if (errors.length > 0) {
    logger.warn("configuration is invalid", { errors: errors.length })
    throw new ValidationFailedError(errors)
  }

  return new Config({ value, merge: merged, defaults: applied, unknownKeys })
}
