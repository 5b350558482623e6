import { randomUUID } from "node:crypto"
import { readFile, rename, stat, writeFile } from "node:fs/promises"
import type { EpochMs } from "@tessera/clock"

/** Contents of a `.lock` file. */
export type LockRecord = {
  owner: string
  key: string
  pid: number
  expiresAt: EpochMs
}

export type LockFileState =
  | { state: "missing" }
  | { state: "held"; record: LockRecord }
  | { state: "unreadable"; modifiedAtMs: EpochMs }

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err
}

function hasErrnoCode(err: unknown, code: string): boolean {
  return isErrnoException(err) && err.code === code
}

function parseRecord(text: string): LockRecord | null {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch {
    return null
  }
  if (typeof raw !== "object" || raw === null) return null
  if (!("owner" in raw) || typeof raw.owner !== "string") return null
  if (!("key" in raw) || typeof raw.key !== "string") return null
  if (!("pid" in raw) || typeof raw.pid !== "number") return null
  if (!("expiresAt" in raw) || typeof raw.expiresAt !== "number") return null
  return { owner: raw.owner, key: raw.key, pid: raw.pid, expiresAt: raw.expiresAt }
}

export async function readLockFile(file: string): Promise<LockFileState> {
  let text: string
  try {
    text = await readFile(file, "utf8")
  } catch (err) {
    if (hasErrnoCode(err, "ENOENT")) return { state: "missing" }
    throw err
  }

  const record = parseRecord(text)
  if (record) return { state: "held", record }

  try {
    const info = await stat(file)
    return { state: "unreadable", modifiedAtMs: info.mtimeMs }
  } catch (err) {
    if (hasErrnoCode(err, "ENOENT")) return { state: "missing" }
    throw err
  }
}

/**
 * Create `file` only if it does not exist yet (`O_EXCL`).
 *
 * @returns `false` when another holder created it first.
 */
export async function createLockFile(file: string, record: LockRecord): Promise<boolean> {
  try {
    await writeFile(file, JSON.stringify(record), { encoding: "utf8", flag: "wx" })
    return true
  } catch (err) {
    if (hasErrnoCode(err, "EEXIST")) return false
    throw err
  }
}

/** Marker file that serializes takeovers of an abandoned `file`. */
export function takeoverPathFor(file: string): string {
  return `${file}.takeover`
}

/**
 * Claim the right to replace an abandoned lock file. Only the claimant may
 * delete `file`; everyone else backs off until the claim is dropped.
 *
 * @returns `false` when another waiter holds the claim.
 */
export function claimTakeover(file: string, record: LockRecord): Promise<boolean> {
  return createLockFile(takeoverPathFor(file), record)
}

/** Modification time of `file`, or `null` when it does not exist. */
export async function modifiedAtMs(file: string): Promise<EpochMs | null> {
  try {
    return (await stat(file)).mtimeMs
  } catch (err) {
    if (hasErrnoCode(err, "ENOENT")) return null
    throw err
  }
}

/** Replace the contents of an existing lock file via temp file and rename. */
export async function replaceLockFile(file: string, record: LockRecord): Promise<void> {
  const temp = `${file}.${randomUUID()}.tmp`
  await writeFile(temp, JSON.stringify(record), "utf8")
  await rename(temp, file)
}
