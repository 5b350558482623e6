import { Command } from "commander"
import type { CliContext } from "../app/create-context"
import { registerConfigCommands } from "../commands/config.commands"
import { registerHistoryCommands } from "../commands/history.commands"
import { registerVaultCommands } from "../commands/vault.commands"

function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

export function buildProgram(ctx: CliContext): Command {
  const program = new Command()
    .name("tessera")
    .description("Layered configuration: load, validate, encrypt and version")
    .option("--json", "machine-readable output")
    .option("-s, --sensitive <path>", "treat this field as sensitive (repeatable, * matches one key)", collect, [])
    .exitOverride()
    .configureOutput({
      writeOut: (text) => ctx.output.stdout(text),
      writeErr: (text) => ctx.output.stderr(text),
    })

  registerConfigCommands(program, ctx)
  registerVaultCommands(program, ctx)
  registerHistoryCommands(program, ctx)

  return program
}
