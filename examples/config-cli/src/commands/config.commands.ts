import {
  type ConfigMapping,
  type ConfigFormat,
  detectFormat,
  generateTemplate,
  loadConfig,
  type MergeConflict,
  mergeSources,
  readDocument,
  resolveEnv,
  serialize,
  SourceNotFoundError,
  toPlain,
} from "@tessera/config"
import { decryptFields, maskFields } from "@tessera/vault"
import type { Command } from "commander"
import type { CliContext } from "../app/create-context"
import { backupFile } from "../app/files"
import {
  emitJson,
  emitText,
  formatOption,
  globalsOf,
  lookupFor,
  type LookupOptions,
  markersFor,
  outputFormat,
  printJson,
  printText,
  readSchema,
  requiredKey,
  sequencePolicy,
  sourcesFor,
  type SourceOptions,
} from "./shared"

type LoadOptions = SourceOptions &
  LookupOptions & {
    schema?: string
    strict?: boolean
    sequences?: string
    to?: string
    output?: string
    explain?: string
    decrypt?: boolean
    showSecrets?: boolean
  }

type MergeOptions = SourceOptions & { sequences?: string; to?: string; output?: string }

type ValidateOptions = SourceOptions & LookupOptions & { schema: string; strict?: boolean }

type EnvOptions = LookupOptions & { format?: string; to?: string; output?: string }

type TemplateOptions = { schema: string; to: string }

function describeConflict(conflict: MergeConflict): string {
  return `${conflict.kind.replace("_", " ")} at ${conflict.path}: ${conflict.sources.join(", ")} -> ${conflict.winner}`
}

function reportConflicts(ctx: CliContext, conflicts: readonly MergeConflict[]): void {
  for (const conflict of conflicts) ctx.output.stderr(`${describeConflict(conflict)}\n`)
}

export function registerConfigCommands(program: Command, ctx: CliContext): void {
  program
    .command("load")
    .description("load, merge and validate configuration files, lowest precedence first")
    .argument("<files...>", "configuration files")
    .option("--schema <file>", "schema to validate against")
    .option("--strict", "reject keys the schema does not declare")
    .option("--format <format>", "format of every input file instead of detecting it")
    .option("--env-prefix <prefix>", "add environment variables with this prefix as the last source")
    .option("--dotenv <file>", "extra variables for ${VAR} placeholders")
    .option("--no-env", "leave ${VAR} placeholders as they are")
    .option("--sequences <policy>", "replace or concat")
    .option("--to <format>", "output format, default: from --output, else yaml")
    .option("-o, --output <file>", "write the result to a file instead of printing it")
    .option("--explain <path>", "print the source that supplied a field instead of the tree")
    .option("--decrypt", "decrypt sensitive fields with the configured key")
    .option("--show-secrets", "print sensitive fields instead of masking them")
    .action(async (files: string[], opts: LoadOptions, cmd: Command) => {
      const globals = globalsOf(cmd)
      const markers = markersFor(ctx, globals)
      const sequences = sequencePolicy(opts.sequences)
      const to = outputFormat(opts, "yaml")

      const config = await loadConfig({
        sources: sourcesFor(ctx, files, opts),
        env: await lookupFor(ctx, opts),
        logger: ctx.logger,
        isSensitive: (path) => markers.matches(path),
        ...(opts.schema && { schema: await readSchema(ctx, opts.schema) }),
        ...(opts.strict && { strict: true }),
        ...(sequences && { merge: { sequences } }),
      })

      if (opts.explain !== undefined) {
        const source = config.explain(opts.explain) ?? null
        if (globals.json) printJson(ctx, { path: opts.explain, source })
        else printText(ctx, `${opts.explain}: ${source ?? "not set"}`)
        return
      }

      let value: ConfigMapping = config.value
      if (opts.decrypt) value = decryptFields(value, markers, await requiredKey(ctx))
      if (!opts.showSecrets) value = maskFields(value, markers)

      if (globals.json) {
        const report = {
          value: toPlain(value),
          conflicts: config.conflicts,
          sources: config.sourcesUsed(),
          unknownKeys: config.unknownKeys(),
        }
        await emitJson(ctx, report, opts.output)
        return
      }

      reportConflicts(ctx, config.conflicts)
      for (const key of config.unknownKeys()) ctx.output.stderr(`unknown key ${key}\n`)
      await emitText(ctx, serialize(value, to), opts.output)
    })

  program
    .command("merge")
    .description("merge configuration files without placeholders or a schema")
    .argument("<files...>", "configuration files, lowest precedence first")
    .option("--format <format>", "format of every input file instead of detecting it")
    .option("--sequences <policy>", "replace or concat")
    .option("--to <format>", "output format, default: from --output, else yaml")
    .option("-o, --output <file>", "write the result to a file instead of printing it")
    .action(async (files: string[], opts: MergeOptions, cmd: Command) => {
      const globals = globalsOf(cmd)
      const sequences = sequencePolicy(opts.sequences)
      const merged = await mergeSources({
        sources: sourcesFor(ctx, files, opts),
        env: false,
        logger: ctx.logger,
        ...(sequences && { merge: { sequences } }),
      })
      const value = maskFields(merged.value, markersFor(ctx, globals))

      if (globals.json) {
        await emitJson(ctx, { value: toPlain(value), conflicts: merged.conflicts }, opts.output)
        return
      }

      reportConflicts(ctx, merged.conflicts)
      await emitText(ctx, serialize(value, outputFormat(opts, "yaml")), opts.output)
    })

  program
    .command("validate")
    .description("check merged configuration files against a schema")
    .argument("<files...>", "configuration files, lowest precedence first")
    .requiredOption("--schema <file>", "schema to validate against")
    .option("--strict", "reject keys the schema does not declare")
    .option("--format <format>", "format of every input file instead of detecting it")
    .option("--env-prefix <prefix>", "add environment variables with this prefix as the last source")
    .option("--dotenv <file>", "extra variables for ${VAR} placeholders")
    .option("--no-env", "leave ${VAR} placeholders as they are")
    .action(async (files: string[], opts: ValidateOptions, cmd: Command) => {
      const globals = globalsOf(cmd)
      const markers = markersFor(ctx, globals)

      const config = await loadConfig({
        sources: sourcesFor(ctx, files, opts),
        schema: await readSchema(ctx, opts.schema),
        env: await lookupFor(ctx, opts),
        logger: ctx.logger,
        isSensitive: (path) => markers.matches(path),
        ...(opts.strict && { strict: true }),
      })

      if (globals.json) printJson(ctx, { valid: true, unknownKeys: config.unknownKeys() })
      else printText(ctx, "valid")
    })

  program
    .command("env")
    .description("resolve ${VAR} placeholders in one file")
    .argument("<file>", "configuration file")
    .option("--format <format>", "input format instead of detecting it")
    .option("--dotenv <file>", "extra variables for placeholders")
    .option("--to <format>", "output format, default: from --output, else the input format")
    .option("-o, --output <file>", "write the result to a file instead of printing it")
    .action(async (file: string, opts: EnvOptions, cmd: Command) => {
      const format: ConfigFormat = formatOption(opts.format) ?? detectFormat(file)
      const doc = await readDocument(file, { cwd: ctx.cwd, format })
      if (!doc) throw SourceNotFoundError.file(file)

      const lookup = await lookupFor(ctx, { ...opts, env: true })
      const resolved = lookup ? resolveEnv(doc.root, lookup, { origin: file }) : doc.root
      const value = maskFields(resolved, markersFor(ctx, globalsOf(cmd)))

      if (globalsOf(cmd).json) await emitJson(ctx, toPlain(value), opts.output)
      else await emitText(ctx, serialize(value, outputFormat(opts, format)), opts.output)
    })

  program
    .command("backup")
    .description("copy a configuration file into backups/ beside it, stamped with the time")
    .argument("<file>", "configuration file")
    .action(async (file: string, _opts: object, cmd: Command) => {
      const backup = await backupFile({ file, cwd: ctx.cwd, clock: ctx.clock })
      ctx.logger.info("backup created", { operation: "backup", path: backup })

      if (globalsOf(cmd).json) printJson(ctx, { file, backup })
      else printText(ctx, `backup created: ${backup}`)
    })

  program
    .command("template")
    .description("write a skeleton configuration from a schema")
    .requiredOption("--schema <file>", "schema file")
    .option("--to <format>", "output format", "yaml")
    .action(async (opts: TemplateOptions, cmd: Command) => {
      const template = generateTemplate(await readSchema(ctx, opts.schema))

      if (globalsOf(cmd).json) printJson(ctx, toPlain(template))
      else printText(ctx, serialize(template, formatOption(opts.to) ?? "yaml"))
    })
}
