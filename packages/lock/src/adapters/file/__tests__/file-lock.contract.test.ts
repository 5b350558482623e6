import { mkdtemp, rm } from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { SystemClock } from "@tessera/clock"
import { describeLockContract } from "../../../ports/__tests__/lock.contract"
import { FileLock } from "../file-lock"

describeLockContract({
  name: "FileLock",
  ttl: () => ({ milliseconds: 5_000 }),
  defaultTimeoutMs: () => 150,
  async make() {
    const directory = await mkdtemp(path.join(os.tmpdir(), "tessera-lock-"))
    return {
      lock: new FileLock({ clock: new SystemClock() }, { directory, defaultTimeoutMs: 150, pollMs: 10 }),
      close: () => rm(directory, { recursive: true, force: true }),
    }
  },
})
