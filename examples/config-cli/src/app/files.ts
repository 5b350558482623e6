import { randomUUID } from "node:crypto"
import { constants } from "node:fs"
import { copyFile, mkdir, open, rename, rm, stat } from "node:fs/promises"
import path from "node:path"
import type { TimeSource } from "@tessera/clock"
import { SourceNotFoundError } from "@tessera/config"

function hasErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && Reflect.get(err, "code") === code
}

/** Writes a temporary file beside `target`, then renames it over `target`. */
export async function writeFileAtomic(target: string, text: string): Promise<void> {
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

/** `20240301_093005` in UTC. */
export function backupStamp(date: Date): string {
  const iso = date.toISOString()
  return `${iso.slice(0, 10).replace(/-/g, "")}_${iso.slice(11, 19).replace(/:/g, "")}`
}

export type BackupOptions = {
  /** Relative to `cwd`. */
  file: string
  cwd: string
  clock: TimeSource
}

/**
 * Copies `file` to `backups/<name>_<stamp><ext>` in the file's directory.
 * Another backup within the same second gets `_2`, `_3` and so on.
 *
 * @returns the backup's path, relative to `cwd`
 * @throws SourceNotFoundError when `file` does not exist
 */
export async function backupFile({ file, cwd, clock }: BackupOptions): Promise<string> {
  const source = path.resolve(cwd, file)
  try {
    await stat(source)
  } catch (err) {
    if (hasErrnoCode(err, "ENOENT")) throw SourceNotFoundError.file(file)
    throw err
  }

  const { dir, name, ext } = path.parse(source)
  const backups = path.join(dir, "backups")
  await mkdir(backups, { recursive: true })

  const base = `${name}_${backupStamp(clock.now())}`
  for (let n = 1; ; n++) {
    const target = path.join(backups, `${base}${n === 1 ? "" : `_${n}`}${ext}`)
    try {
      await copyFile(source, target, constants.COPYFILE_EXCL)
      return path.relative(cwd, target)
    } catch (err) {
      if (!hasErrnoCode(err, "EEXIST")) throw err
    }
  }
}
