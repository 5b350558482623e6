import { describeError, serializeError, toAppError } from "@tessera/errors"
import { CommanderError } from "commander"
import { type CliContextOptions, createCliContext, type Output, processOutput } from "../app/create-context"
import { buildProgram } from "./build-program"

function report(output: Output, err: unknown, json: boolean): void {
  if (json) {
    const serialized = serializeError(toAppError(err), { redactKeys: ["key", "passphrase"] })
    output.stderr(`${JSON.stringify({ error: serialized })}\n`)
    return
  }
  output.stderr(`error: ${describeError(err)}\n`)
}

/**
 * Run one command line (without the node and script arguments).
 *
 * @returns the process exit code
 */
export async function run(argv: readonly string[], options: CliContextOptions = {}): Promise<number> {
  const output = options.output ?? processOutput

  try {
    const ctx = await createCliContext({ ...options, output })
    await buildProgram(ctx).parseAsync([...argv], { from: "user" })
    return 0
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode
    report(output, err, argv.includes("--json"))
    return 1
  }
}
