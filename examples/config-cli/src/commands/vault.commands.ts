import path from "node:path"
import { type ConfigDocument, readDocument, serialize, SourceNotFoundError, toPlain, withRoot } from "@tessera/config"
import { encodeKey, generateKey, type KeyEncoding } from "@tessera/keyring"
import { decryptFields, encryptFields, plaintextSecrets } from "@tessera/vault"
import type { Command } from "commander"
import type { CliContext } from "../app/create-context"
import { backupFile, writeFileAtomic } from "../app/files"
import { emitJson, emitText, formatOption, globalsOf, markersFor, outputFormat, printText, requiredKey } from "./shared"

type CryptOptions = { format?: string; write?: boolean; output?: string }

type KeygenOptions = { encoding: string }

const keyEncodings: readonly KeyEncoding[] = ["base64", "base64url", "hex"]

function isKeyEncoding(value: string): value is KeyEncoding {
  return keyEncodings.some((e) => e === value)
}

async function readInput(ctx: CliContext, file: string, opts: CryptOptions): Promise<ConfigDocument> {
  const format = formatOption(opts.format)
  const doc = await readDocument(file, { cwd: ctx.cwd, ...(format && { format }) })
  if (!doc) throw SourceNotFoundError.file(file)
  return doc
}

/** With `--write`, backs the file up and replaces it. Otherwise prints or writes `--output`. */
async function emit(ctx: CliContext, cmd: Command, doc: ConfigDocument, opts: CryptOptions): Promise<void> {
  if (opts.write) {
    const backup = await backupFile({ file: doc.origin, cwd: ctx.cwd, clock: ctx.clock })
    ctx.logger.info("backup created", { operation: "backup", path: backup })
    await writeFileAtomic(path.resolve(ctx.cwd, doc.origin), serialize(doc.root, doc.format))
    return
  }

  if (globalsOf(cmd).json) await emitJson(ctx, toPlain(doc.root), opts.output)
  else await emitText(ctx, serialize(doc.root, outputFormat(opts, doc.format)), opts.output)
}

export function registerVaultCommands(program: Command, ctx: CliContext): void {
  program
    .command("encrypt")
    .description("encrypt sensitive fields of a configuration file")
    .argument("<file>", "configuration file")
    .option("--format <format>", "input format instead of detecting it")
    .option("--write", "back the file up, then replace it")
    .option("-o, --output <file>", "write the result to another file instead of printing it")
    .action(async (file: string, opts: CryptOptions, cmd: Command) => {
      const doc = await readInput(ctx, file, opts)
      const markers = markersFor(ctx, globalsOf(cmd))
      const root = encryptFields(doc.root, markers, await requiredKey(ctx))

      await emit(ctx, cmd, withRoot(doc, root), opts)
      ctx.logger.info("fields encrypted", { operation: "encrypt", path: file })
    })

  program
    .command("decrypt")
    .description("decrypt sensitive fields of a configuration file")
    .argument("<file>", "configuration file")
    .option("--format <format>", "input format instead of detecting it")
    .option("--write", "back the file up, then replace it")
    .option("-o, --output <file>", "write the result to another file instead of printing it")
    .action(async (file: string, opts: CryptOptions, cmd: Command) => {
      const doc = await readInput(ctx, file, opts)
      const markers = markersFor(ctx, globalsOf(cmd))
      const root = decryptFields(doc.root, markers, await requiredKey(ctx))

      await emit(ctx, cmd, withRoot(doc, root), opts)
      const written = opts.write ? file : opts.output
      if (written !== undefined) {
        ctx.logger.warn("file now holds plaintext secrets", {
          operation: "decrypt",
          path: written,
          fields: plaintextSecrets(root, markers),
        })
      }
    })

  program
    .command("keygen")
    .description("print a new random 32-byte key")
    .option("--encoding <encoding>", "base64, base64url or hex", "base64")
    .action((opts: KeygenOptions) => {
      if (!isKeyEncoding(opts.encoding)) {
        throw new RangeError(`--encoding must be one of ${keyEncodings.join(", ")}, got "${opts.encoding}"`)
      }
      printText(ctx, encodeKey(generateKey(), opts.encoding))
    })
}
