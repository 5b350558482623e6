import { writeFile } from "node:fs/promises"
import path from "node:path"
import { describeValue, mergeSources, serialize, toPlain } from "@tessera/config"
import type { FieldDelta, VersionSnapshot } from "@tessera/history"
import { decryptFields } from "@tessera/vault"
import { type Command, InvalidArgumentError } from "commander"
import type { CliContext } from "../app/create-context"
import {
  formatOption,
  globalsOf,
  lookupFor,
  type LookupOptions,
  markersFor,
  optionalKey,
  printJson,
  printText,
  readSchema,
  requiredKey,
  sequencePolicy,
  sourcesFor,
  type SourceOptions,
} from "./shared"

type CommitOptions = SourceOptions &
  LookupOptions & {
    schema?: string
    strict?: boolean
    sequences?: string
    author?: string
  }

type LogOptions = { limit?: number }

type RollbackOptions = { to: string; output?: string; decrypt?: boolean }

type PruneOptions = { keep: number }

export function parsePositiveInt(raw: string): number {
  const n = Number(raw)
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("expected a positive integer")
  return n
}

function summary(snapshot: VersionSnapshot) {
  return {
    seq: snapshot.seq,
    hash: snapshot.hash,
    timestamp: snapshot.timestamp,
    ...(snapshot.author !== undefined && { author: snapshot.author }),
    sources: snapshot.sources,
  }
}

function describeDelta(delta: FieldDelta): string {
  const mark = delta.kind === "added" ? "+" : delta.kind === "removed" ? "-" : "~"
  if (delta.sensitive) return `${mark} ${delta.path} (sensitive)`

  const { before, after } = delta
  if (before && after) return `${mark} ${delta.path}: ${describeValue(before)} -> ${describeValue(after)}`
  const value = before ?? after
  return value ? `${mark} ${delta.path}: ${describeValue(value)}` : `${mark} ${delta.path}`
}

export function registerHistoryCommands(program: Command, ctx: CliContext): void {
  program
    .command("commit")
    .description("merge configuration files and record the result as a new snapshot")
    .argument("<files...>", "configuration files, lowest precedence first")
    .option("--schema <file>", "schema the snapshot must satisfy")
    .option("--strict", "reject keys the schema does not declare")
    .option("--author <name>", "recorded with the snapshot")
    .option("--format <format>", "format of every input file instead of detecting it")
    .option("--env-prefix <prefix>", "add environment variables with this prefix as the last source")
    .option("--dotenv <file>", "extra variables for ${VAR} placeholders")
    .option("--no-env", "leave ${VAR} placeholders as they are")
    .option("--sequences <policy>", "replace or concat")
    .action(async (files: string[], opts: CommitOptions, cmd: Command) => {
      const globals = globalsOf(cmd)
      const sequences = sequencePolicy(opts.sequences)
      const merged = await mergeSources({
        sources: sourcesFor(ctx, files, opts),
        env: await lookupFor(ctx, opts),
        logger: ctx.logger,
        ...(sequences && { merge: { sequences } }),
      })

      const key = await optionalKey(ctx)
      const history = ctx.openHistory({
        sensitive: markersFor(ctx, globals),
        ...(opts.schema && { schema: await readSchema(ctx, opts.schema) }),
        ...(opts.strict && { strict: true }),
        ...(key && { encryptionKey: key }),
      })

      const snapshot = await history.commit(merged, { ...(opts.author && { author: opts.author }) })

      if (globals.json) printJson(ctx, summary(snapshot))
      else printText(ctx, `committed ${snapshot.seq} (${snapshot.hash.slice(0, 12)})`)
    })

  program
    .command("log")
    .description("list snapshots, newest first")
    .option("--limit <n>", "show at most n snapshots", parsePositiveInt)
    .action(async (opts: LogOptions, cmd: Command) => {
      const snapshots: VersionSnapshot[] = []
      for await (const snapshot of ctx.openHistory().history()) {
        if (opts.limit !== undefined && snapshots.length >= opts.limit) break
        snapshots.push(snapshot)
      }

      if (globalsOf(cmd).json) {
        printJson(ctx, snapshots.map(summary))
        return
      }
      for (const s of snapshots) {
        printText(ctx, [s.seq, s.timestamp, s.hash.slice(0, 12), s.author ?? "-", s.sources.join(", ")].join("  "))
      }
    })

  program
    .command("diff")
    .description("fields that differ between two snapshots")
    .argument("<from>", "older sequence number", parsePositiveInt)
    .argument("<to>", "newer sequence number", parsePositiveInt)
    .action(async (from: number, to: number, _opts: object, cmd: Command) => {
      const globals = globalsOf(cmd)
      const deltas = await ctx.openHistory({ sensitive: markersFor(ctx, globals) }).diff(from, to)

      if (globals.json) {
        printJson(
          ctx,
          deltas.map((d) => ({
            ...d,
            ...(d.before && { before: toPlain(d.before) }),
            ...(d.after && { after: toPlain(d.after) }),
          })),
        )
        return
      }
      if (deltas.length === 0) printText(ctx, "no differences")
      for (const delta of deltas) printText(ctx, describeDelta(delta))
    })

  program
    .command("rollback")
    .description("print or write the configuration of a snapshot; nothing is committed")
    .argument("<seq>", "sequence number", parsePositiveInt)
    .option("--to <format>", "output format", "yaml")
    .option("--output <file>", "write to this file instead of printing")
    .option("--decrypt", "decrypt sensitive fields with the configured key")
    .action(async (seq: number, opts: RollbackOptions, cmd: Command) => {
      const globals = globalsOf(cmd)
      const markers = markersFor(ctx, globals)
      let tree = await ctx.openHistory({ sensitive: markers }).rollback(seq)
      if (opts.decrypt) tree = decryptFields(tree, markers, await requiredKey(ctx))

      const text = serialize(tree, formatOption(opts.to) ?? "yaml")
      if (opts.output) {
        await writeFile(path.resolve(ctx.cwd, opts.output), text, "utf8")
        ctx.logger.info("snapshot written", { operation: "rollback", seq, path: opts.output })
      } else if (globals.json) {
        printJson(ctx, toPlain(tree))
      } else {
        printText(ctx, text)
      }
    })

  program
    .command("prune")
    .description("delete all but the newest snapshots")
    .requiredOption("--keep <n>", "snapshots to keep", parsePositiveInt)
    .action(async (opts: PruneOptions, cmd: Command) => {
      const result = await ctx.openHistory().prune({ keepLatest: opts.keep })

      if (globalsOf(cmd).json) printJson(ctx, result)
      else printText(ctx, `removed ${result.removed}, kept ${result.kept}`)
    })

  program
    .command("repair")
    .description("move a corrupt tail of the history aside")
    .action(async (_opts: object, cmd: Command) => {
      const result = await ctx.openHistory().repair()

      if (globalsOf(cmd).json) printJson(ctx, result)
      else if (result) printText(ctx, `moved ${result.removed} lines to ${result.quarantinedTo}, kept ${result.kept}`)
      else printText(ctx, "history is intact")
    })
}
