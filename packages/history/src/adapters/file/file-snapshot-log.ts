import { randomUUID } from "node:crypto"
import { mkdir, open, readFile, rename, rm } from "node:fs/promises"
import path from "node:path"
import type { Clock } from "@tessera/clock"
import type { SnapshotLog } from "../../ports/snapshot-log"

export type FileSnapshotLogDeps = {
  clock: Clock
}

export type FileSnapshotLogConfig = {
  /** JSON Lines file, one snapshot per line. */
  file: string
}

function isNotFoundError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

function joinLines(lines: readonly string[]): string {
  return lines.length === 0 ? "" : `${lines.join("\n")}\n`
}

/**
 * Snapshot log in a JSON Lines file. Every write goes to a temporary file
 * in the same directory, is flushed, then renamed over the target.
 */
export class FileSnapshotLog implements SnapshotLog {
  readonly location: string

  constructor(
    private readonly deps: FileSnapshotLogDeps,
    config: FileSnapshotLogConfig,
  ) {
    this.location = path.resolve(config.file)
  }

  async readLines(): Promise<string[]> {
    const text = await this.readText()
    if (text === "") return []

    const lines = text.split("\n")
    if (lines.at(-1) === "") lines.pop()
    return lines
  }

  async append(line: string): Promise<void> {
    const text = await this.readText()
    const separator = text === "" || text.endsWith("\n") ? "" : "\n"
    await this.writeAtomic(this.location, `${text}${separator}${line}\n`)
  }

  async rewrite(lines: readonly string[]): Promise<void> {
    await this.writeAtomic(this.location, joinLines(lines))
  }

  async quarantine(lines: readonly string[]): Promise<string> {
    const target = `${this.location}.corrupt-${this.deps.clock.nowMs()}`
    await this.writeAtomic(target, joinLines(lines))
    return target
  }

  private async readText(): Promise<string> {
    try {
      return await readFile(this.location, "utf8")
    } catch (err) {
      if (isNotFoundError(err)) return ""
      throw err
    }
  }

  private async writeAtomic(target: string, text: string): Promise<void> {
    await mkdir(path.dirname(target), { recursive: true })
    const temp = `${target}.${randomUUID()}.tmp`

    try {
      const handle = await open(temp, "wx")
      try {
        await handle.writeFile(text, "utf8")
        await handle.sync()
      } finally {
        await handle.close()
      }
      await rename(temp, target)
    } catch (err) {
      await rm(temp, { force: true })
      throw err
    }
  }
}
