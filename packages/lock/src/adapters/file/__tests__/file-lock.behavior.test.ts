import { mkdtemp, readdir, readFile, rm, utimes, writeFile } from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { FakeClock } from "@tessera/clock"
import type { Logger } from "@tessera/logger"
import { mock } from "vitest-mock-extended"
import { FileLock } from "../file-lock"

const ttl = { milliseconds: 1_000 }

describe("FileLock behavior", () => {
  let directory: string
  let clock: FakeClock
  let lock: FileLock

  beforeEach(async () => {
    directory = await mkdtemp(path.join(os.tmpdir(), "tessera-file-lock-"))
    clock = new FakeClock(1_000_000)
    lock = new FileLock({ clock }, { directory, defaultTimeoutMs: 500, pollMs: 50 })
  })

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true })
  })

  it("names the lock file after the encoded key", () => {
    expect(lock.pathFor("history.jsonl")).toBe(path.join(directory, "history.jsonl.lock"))
    expect(lock.pathFor("a/b")).toBe(path.join(directory, "a%2Fb.lock"))
  })

  it("writes an ownership record with the expiry", async () => {
    await lock.tryAcquire("history.jsonl", { ttl })

    const record = JSON.parse(await readFile(lock.pathFor("history.jsonl"), "utf8"))
    expect(record).toMatchObject({ key: "history.jsonl", pid: process.pid, expiresAt: 1_001_000 })
    expect(typeof record.owner).toBe("string")
  })

  it("removes the lock file on release", async () => {
    const lease = await lock.tryAcquire("history.jsonl", { ttl })
    await lease?.release()

    await expect(readFile(lock.pathFor("history.jsonl"), "utf8")).rejects.toMatchObject({ code: "ENOENT" })
  })

  it("creates the lock directory on demand", async () => {
    const nested = new FileLock({ clock }, { directory: path.join(directory, "a", "b"), defaultTimeoutMs: 0, pollMs: 10 })

    expect(await nested.tryAcquire("k", { ttl })).not.toBeNull()
  })

  it("treats an expired record as abandoned and logs the takeover", async () => {
    const logger = mock<Logger>()
    logger.child.mockReturnValue(logger)
    const logged = new FileLock({ clock, logger }, { directory, defaultTimeoutMs: 0, pollMs: 10 })

    const first = await logged.tryAcquire("k", { ttl })
    expect(await logged.tryAcquire("k", { ttl })).toBeNull()

    clock.advance(1_000)
    const second = await logged.tryAcquire("k", { ttl })

    expect(second).not.toBeNull()
    expect(logger.warn).toHaveBeenCalledWith("taking over abandoned lock file", {
      lockKey: "k",
      previousPid: process.pid,
    })
    expect(await first?.extend(ttl)).toBe(false)
  })

  it("extend() moves the expiry forward", async () => {
    const lease = await lock.tryAcquire("k", { ttl })
    clock.advance(900)

    expect(await lease?.extend(ttl)).toBe(true)
    clock.advance(900)

    expect(await lock.tryAcquire("k", { ttl })).toBeNull()
    const record = JSON.parse(await readFile(lock.pathFor("k"), "utf8"))
    expect(record.expiresAt).toBe(1_001_900)
  })

  it("keeps an unreadable lock file within the grace period", async () => {
    const file = lock.pathFor("k")
    await writeFile(file, "")
    clock.set(Date.now())

    expect(await lock.tryAcquire("k", { ttl })).toBeNull()
  })

  it("takes over an unreadable lock file past the grace period", async () => {
    const file = lock.pathFor("k")
    await writeFile(file, "{not json")
    const old = new Date(Date.now() - 60_000)
    await utimes(file, old, old)
    clock.set(Date.now())

    expect(await lock.tryAcquire("k", { ttl })).not.toBeNull()
  })

  it("waits on the clock and gives up at the timeout", async () => {
    await lock.tryAcquire("k", { ttl: { milliseconds: 60_000 } })
    const start = clock.nowMs()

    expect(await lock.acquire("k", { ttl })).toBeNull()
    expect(clock.nowMs() - start).toBe(500)
  })

  it("acquires once the holder's lease expires during the wait", async () => {
    await lock.tryAcquire("k", { ttl: { milliseconds: 200 } })

    const lease = await lock.acquire("k", { ttl, timeoutMs: 500 })

    expect(lease).not.toBeNull()
    expect(clock.nowMs()).toBe(1_000_200)
  })

  it("lets exactly one of several racing waiters take over an expired lease", async () => {
    const rivals = [1, 2, 3, 4].map(() => new FileLock({ clock }, { directory, defaultTimeoutMs: 0, pollMs: 10 }))

    for (let round = 0; round < 25; round++) {
      const stale = { owner: `stale-${round}`, key: "k", pid: 1, expiresAt: clock.nowMs() - 1 }
      await writeFile(lock.pathFor("k"), JSON.stringify(stale))

      const leases = await Promise.all(rivals.map((rival) => rival.tryAcquire("k", { ttl })))

      expect(leases.filter((lease) => lease !== null)).toHaveLength(1)
      expect(await readdir(directory)).toEqual(["k.lock"])
    }
  })

  it("backs off while another waiter holds the takeover claim", async () => {
    const file = lock.pathFor("k")
    await writeFile(file, JSON.stringify({ owner: "stale", key: "k", pid: 1, expiresAt: clock.nowMs() - 1 }))
    await writeFile(`${file}.takeover`, "{}")

    expect(await lock.tryAcquire("k", { ttl })).toBeNull()
    expect(JSON.parse(await readFile(file, "utf8")).owner).toBe("stale")
  })

  it("drops a takeover claim left behind past the grace period", async () => {
    const file = lock.pathFor("k")
    await writeFile(file, JSON.stringify({ owner: "stale", key: "k", pid: 1, expiresAt: 0 }))
    await writeFile(`${file}.takeover`, "{}")
    const old = new Date(Date.now() - 60_000)
    await utimes(`${file}.takeover`, old, old)
    clock.set(Date.now())

    expect(await lock.tryAcquire("k", { ttl })).toBeNull()
    expect(await lock.tryAcquire("k", { ttl })).not.toBeNull()
  })
})
