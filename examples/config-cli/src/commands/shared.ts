import path from "node:path"
import {
  type ConfigFormat,
  type ConfigSource,
  detectFormat,
  DotenvSource,
  EnvSource,
  type EnvLookup,
  envLookup,
  FileSource,
  isConfigFormat,
  parseSchema,
  readDocument,
  type Schema,
  type SequencePolicy,
  SourceNotFoundError,
  UnsupportedFormatError,
} from "@tessera/config"
import { KeyringError, resolveKey } from "@tessera/keyring"
import { SensitiveFields } from "@tessera/vault"
import type { Command } from "commander"
import type { CliContext } from "../app/create-context"
import { writeFileAtomic } from "../app/files"

export type GlobalOptions = {
  json: boolean
  /** Sensitive paths from `--sensitive`, on top of `TESSERA_SENSITIVE_PATHS`. */
  sensitive: string[]
}

export function globalsOf(cmd: Command): GlobalOptions {
  const opts = cmd.optsWithGlobals()
  const sensitive: unknown = opts.sensitive
  return {
    json: opts.json === true,
    sensitive: Array.isArray(sensitive) ? sensitive.filter((s): s is string => typeof s === "string") : [],
  }
}

export function markersFor(ctx: CliContext, globals: GlobalOptions): SensitiveFields {
  if (globals.sensitive.length === 0) return ctx.sensitive
  return new SensitiveFields({
    paths: [...ctx.config.sensitive.paths, ...globals.sensitive],
    suffixes: ctx.config.sensitive.suffixes,
  })
}

export function formatOption(tag: string | undefined): ConfigFormat | undefined {
  if (tag === undefined) return undefined
  if (!isConfigFormat(tag)) throw UnsupportedFormatError.tag(tag)
  return tag
}

/** `--to`, else the format `--output`'s extension names, else `fallback`. */
export function outputFormat(opts: { to?: string; output?: string }, fallback: ConfigFormat): ConfigFormat {
  const to = formatOption(opts.to)
  if (to) return to
  if (opts.output === undefined) return fallback

  try {
    return detectFormat(opts.output)
  } catch (err) {
    if (err instanceof UnsupportedFormatError) return fallback
    throw err
  }
}

export function sequencePolicy(tag: string | undefined): SequencePolicy | undefined {
  if (tag === undefined || tag === "replace" || tag === "concat") return tag
  throw new RangeError(`--sequences must be "replace" or "concat", got "${tag}"`)
}

export type SourceOptions = {
  format?: string
  envPrefix?: string
}

/** One required `FileSource` per file, then an `EnvSource` when a prefix is given. */
export function sourcesFor(ctx: CliContext, files: readonly string[], opts: SourceOptions): ConfigSource[] {
  const format = formatOption(opts.format)
  const sources: ConfigSource[] = files.map(
    (file) => new FileSource({ file, required: true, cwd: ctx.cwd, ...(format && { format }) }),
  )
  if (opts.envPrefix) sources.push(new EnvSource({ prefix: opts.envPrefix, env: ctx.env }))
  return sources
}

export type LookupOptions = {
  /** commander sets `false` for `--no-env`. */
  env?: boolean
  dotenv?: string
}

/** Placeholder lookup: the environment, then `--dotenv`. `false` with `--no-env`. */
export async function lookupFor(ctx: CliContext, opts: LookupOptions): Promise<EnvLookup | false> {
  if (opts.env === false) return false
  const dotenv = opts.dotenv
    ? await new DotenvSource({ file: opts.dotenv, required: true, cwd: ctx.cwd }).loadRecord()
    : {}
  return envLookup(ctx.env, dotenv)
}

/** @throws SourceNotFoundError, ParseError, SchemaDefinitionError */
export async function readSchema(ctx: CliContext, file: string): Promise<Schema> {
  const doc = await readDocument(file, { cwd: ctx.cwd })
  if (!doc) throw SourceNotFoundError.file(file)
  return parseSchema(doc.root, file)
}

/** The configured key, or `undefined` when no key source has one. */
export async function optionalKey(ctx: CliContext): Promise<Buffer | undefined> {
  try {
    return (await resolveKey(ctx.keySources(), { logger: ctx.logger })).key
  } catch (err) {
    if (err instanceof KeyringError && err.code === "key_not_found") return undefined
    throw err
  }
}

export async function requiredKey(ctx: CliContext): Promise<Buffer> {
  return (await resolveKey(ctx.keySources(), { logger: ctx.logger })).key
}

export function printJson(ctx: CliContext, value: unknown): void {
  ctx.output.stdout(`${JSON.stringify(value, null, 2)}\n`)
}

export function printText(ctx: CliContext, text: string): void {
  ctx.output.stdout(text.endsWith("\n") ? text : `${text}\n`)
}

/** Prints `text`, or writes it to `output` when one is given. */
export async function emitText(ctx: CliContext, text: string, output?: string): Promise<void> {
  if (output === undefined) {
    printText(ctx, text)
    return
  }
  await writeFileAtomic(path.resolve(ctx.cwd, output), text.endsWith("\n") ? text : `${text}\n`)
  ctx.logger.info("output written", { path: output })
}

export async function emitJson(ctx: CliContext, value: unknown, output?: string): Promise<void> {
  await emitText(ctx, JSON.stringify(value, null, 2), output)
}
