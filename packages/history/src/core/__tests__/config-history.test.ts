import { FakeClock } from "@tessera/clock"
import {
  defineSchema,
  getAtPath,
  mappingFromPlain,
  merge,
  type MergeResult,
  parse,
  type PlainMapping,
  toPlain,
  ValidationFailedError,
} from "@tessera/config"
import { LockTimeoutError, MemoryLock } from "@tessera/lock"
import type { Logger } from "@tessera/logger"
import { decryptFields, isEncryptedValue, SensitiveFields } from "@tessera/vault"
import { mock, type MockProxy } from "vitest-mock-extended"
import { MemorySnapshotLog } from "../../adapters/memory/memory-snapshot-log"
import type { VersionSnapshot } from "../../ports/snapshot"
import { snapshotLine } from "../../tests/utils/snapshot-lines"
import { ConfigHistory, type ConfigHistoryOptions } from "../config-history"
import { HistoryCorruptionError, PlaintextSecretError, SnapshotNotFoundError } from "../history-error"

const key = Buffer.alloc(32, 3)
const markers = new SensitiveFields({ paths: ["db.password"] })

function merged(...layers: PlainMapping[]): MergeResult {
  return merge(layers.map((value, i) => ({ name: `layer-${i + 1}`, value: mappingFromPlain(value) })))
}

async function collect(history: ConfigHistory): Promise<VersionSnapshot[]> {
  const out: VersionSnapshot[] = []
  for await (const snapshot of history.history()) out.push(snapshot)
  return out
}

describe("ConfigHistory", () => {
  let clock: FakeClock
  let log: MemorySnapshotLog
  let lock: MemoryLock
  let logger: MockProxy<Logger>

  const open = (options: Partial<ConfigHistoryOptions> = {}) =>
    new ConfigHistory(
      { log, lock, clock, logger },
      { lockKey: "history.jsonl", lockTtlMs: 30_000, lockTimeoutMs: 200, ...options },
    )

  beforeEach(() => {
    clock = new FakeClock(Date.UTC(2024, 5, 1, 12, 0, 0))
    log = new MemorySnapshotLog()
    lock = new MemoryLock({ clock }, { defaultTimeoutMs: 1_000, pollMs: 50 })
    logger = mock<Logger>()
    logger.child.mockReturnValue(logger)
  })

  describe("commit", () => {
    it("numbers snapshots from 1 and stamps them with the clock", async () => {
      const history = open()

      const first = await history.commit(merged({ a: 1 }, { b: 2 }), { author: "ops" })
      clock.advance(60_000)
      const second = await history.commit(merged({ a: 2 }))

      expect(first).toMatchObject({
        seq: 1,
        timestamp: "2024-06-01T12:00:00.000Z",
        author: "ops",
        sources: ["layer-1", "layer-2"],
      })
      expect(first.hash).toMatch(/^[0-9a-f]{64}$/)
      expect(second).toMatchObject({ seq: 2, timestamp: "2024-06-01T12:01:00.000Z" })
      expect(second).not.toHaveProperty("author")
      expect(await log.readLines()).toHaveLength(2)
    })

    it("logs each commit", async () => {
      await open().commit(merged({ a: 1 }), { author: "ops" })

      expect(logger.info).toHaveBeenCalledWith(
        "snapshot committed",
        expect.objectContaining({ operation: "commit", seq: 1, sources: 1, author: "ops" }),
      )
    })

    it("rejects a tree that fails the schema and writes nothing", async () => {
      const history = open({ schema: defineSchema({ fields: { "db.port": { type: "number", required: true } } }) })

      const err = await history.commit(merged({ db: { port: "5432" } })).catch((e: unknown) => e)

      expect(err).toBeInstanceOf(ValidationFailedError)
      expect(err instanceof ValidationFailedError && err.errors.map((e) => [e.code, e.path])).toEqual([
        ["type_mismatch", "db.port"],
      ])
      expect(await log.readLines()).toEqual([])
    })

    it("stores schema defaults with the tree", async () => {
      const schema = defineSchema({ fields: { "db.port": { type: "integer", default: 5432 } } })

      const snapshot = await open({ schema }).commit(merged({ db: { host: "a" } }))

      expect(toPlain(snapshot.tree)).toEqual({ db: { host: "a", port: 5432 } })
    })

    it("refuses plaintext secrets when no key is configured", async () => {
      const history = open({ sensitive: markers })

      await expect(history.commit(merged({ db: { password: "test-secret" } }))).rejects.toThrow(
        new PlaintextSecretError(["db.password"]).message,
      )
      expect(await log.readLines()).toEqual([])
    })

    it("encrypts sensitive fields when a key is configured", async () => {
      const history = open({ sensitive: markers, encryptionKey: key })

      await history.commit(merged({ db: { host: "a", password: "test-secret" } }))

      const stored = (await history.latest())?.tree
      const password = stored && getAtPath(stored, "db.password")
      expect(password?.kind === "string" && isEncryptedValue(password.value)).toBe(true)
      expect(stored && toPlain(decryptFields(stored, markers, key))).toEqual({
        db: { host: "a", password: "test-secret" },
      })
      expect(JSON.stringify(await log.readLines())).not.toContain("test-secret")
    })

    it("fails with LockTimeoutError while another writer holds the store", async () => {
      const held = await lock.tryAcquire("history.jsonl", { ttl: { milliseconds: 60_000 } })

      await expect(open().commit(merged({ a: 1 }))).rejects.toBeInstanceOf(LockTimeoutError)
      expect(logger.warn).toHaveBeenCalledWith(
        "history lock not acquired",
        expect.objectContaining({ operation: "commit" }),
      )
      expect(await log.readLines()).toEqual([])

      await held?.release()
    })
  })

  describe("reads", () => {
    it("rollback() returns the committed tree", async () => {
      const history = open()
      const tree = { db: { host: "a", port: 5432 }, tags: ["x", "y"] }

      const { seq } = await history.commit(merged(tree))

      expect(toPlain(await history.rollback(seq))).toEqual(tree)
      expect(await log.readLines()).toHaveLength(1)
    })

    it("history() is newest first and sees later commits", async () => {
      const history = open()
      await history.commit(merged({ a: 1 }))
      await history.commit(merged({ a: 2 }))

      expect((await collect(history)).map((s) => s.seq)).toEqual([2, 1])

      await history.commit(merged({ a: 3 }))
      expect((await collect(history)).map((s) => s.seq)).toEqual([3, 2, 1])
    })

    it("history() can be walked again and reads the log each time", async () => {
      const history = open()
      await history.commit(merged({ a: 1 }))
      const snapshots = history.history()

      const seqs = async () => {
        const out: number[] = []
        for await (const snapshot of snapshots) out.push(snapshot.seq)
        return out
      }

      expect(await seqs()).toEqual([1])
      await history.commit(merged({ a: 2 }))
      expect(await seqs()).toEqual([2, 1])
    })

    it("keeps key order and unusual keys through commit and rollback", async () => {
      const history = open()
      const tree = parse('{"name":"x","10":1,"2":2,"__proto__":{"x":1}}', "json").root

      const { seq } = await history.commit(merge([{ name: "app.json", value: tree }]))

      expect((await collect(history)).map((s) => s.seq)).toEqual([seq])
      expect([...(await history.rollback(seq)).entries.keys()]).toEqual(["name", "10", "2", "__proto__"])
      expect((await history.commit(merged({ a: 1 }))).seq).toBe(2)
      expect(log.quarantined).toEqual([])
    })

    it("get() fails for an unknown sequence number", async () => {
      await expect(open().get(4)).rejects.toBeInstanceOf(SnapshotNotFoundError)
    })

    it("latest() is null before the first commit", async () => {
      expect(await open().latest()).toBeNull()
    })

    it("diff() reports each change between two snapshots once, ignoring those in between", async () => {
      const history = open()
      await history.commit(merged({ db: { host: "a", port: 5432 }, log: { level: "info" }, tags: ["x"] }))
      await history.commit(merged({ db: { host: "b", port: 5432 }, log: { level: "debug" }, tags: ["x"] }))
      await history.commit(
        merged({ db: { host: "c", port: 6543 }, log: { level: "info" }, tags: ["x", "y"], cache: { ttl: 60 } }),
      )

      const deltas = await history.diff(1, 3)

      expect(deltas.map(({ path, kind }) => [path, kind])).toEqual([
        ["db.host", "changed"],
        ["db.port", "changed"],
        ["tags", "changed"],
        ["cache", "added"],
      ])
      expect(deltas[0]?.after).toEqual({ kind: "string", value: "c" })
    })

    it("diff() shows only that an encrypted field changed", async () => {
      const history = open({ sensitive: markers, encryptionKey: key })
      await history.commit(merged({ db: { password: "test-secret" } }))
      await history.commit(merged({ db: { password: "test-secret" } }))
      await history.commit(merged({ db: { password: "other-secret" } }))

      expect(await history.diff(1, 2)).toEqual([])
      expect(await history.diff(2, 3)).toEqual([{ path: "db.password", kind: "changed", sensitive: true }])
    })
  })

  describe("corruption", () => {
    beforeEach(async () => {
      await log.rewrite([snapshotLine(1, { a: 1 }), "{truncated", snapshotLine(3, { a: 3 })])
    })

    it("blocks history reads", async () => {
      const err = await collect(open()).catch((e: unknown) => e)

      expect(err).toBeInstanceOf(HistoryCorruptionError)
      expect(err instanceof HistoryCorruptionError && [err.line, err.reason]).toEqual([2, "malformed_record"])
      await expect(open().latest()).rejects.toBeInstanceOf(HistoryCorruptionError)
    })

    it("does not block commits, which continue after the intact prefix", async () => {
      const history = open()

      const snapshot = await history.commit(merged({ a: 2 }))

      expect(snapshot.seq).toBe(2)
      expect(log.quarantined).toEqual([["{truncated", snapshotLine(3, { a: 3 })]])
      expect((await collect(history)).map((s) => s.seq)).toEqual([2, 1])
      expect(logger.warn).toHaveBeenCalledWith(
        "corrupt history quarantined",
        expect.objectContaining({ removed: 2, kept: 1, quarantinedTo: "memory:history#quarantine-1" }),
      )
    })

    it("repair() moves the bad tail aside", async () => {
      const history = open()

      expect(await history.repair()).toEqual({
        quarantinedTo: "memory:history#quarantine-1",
        removed: 2,
        kept: 1,
      })
      expect(await history.repair()).toBeNull()
      expect((await collect(history)).map((s) => s.seq)).toEqual([1])
    })
  })

  describe("prune", () => {
    it("keeps the newest snapshots with their sequence numbers", async () => {
      const history = open()
      for (const a of [1, 2, 3]) await history.commit(merged({ a }))

      expect(await history.prune({ keepLatest: 2 })).toEqual({ removed: 1, kept: 2 })

      expect((await collect(history)).map((s) => s.seq)).toEqual([3, 2])
      expect((await history.commit(merged({ a: 4 }))).seq).toBe(4)
      expect(logger.info).toHaveBeenCalledWith(
        "snapshots pruned",
        expect.objectContaining({ operation: "prune", removed: 1, kept: 2, oldestSeq: 2 }),
      )
    })

    it("does nothing when there are no more snapshots than asked to keep", async () => {
      const history = open()
      await history.commit(merged({ a: 1 }))

      expect(await history.prune({ keepLatest: 5 })).toEqual({ removed: 0, kept: 1 })
      expect(logger.info).not.toHaveBeenCalledWith("snapshots pruned", expect.anything())
    })

    it("requires keeping at least one snapshot", async () => {
      await expect(open().prune({ keepLatest: 0 })).rejects.toThrow(RangeError)
    })
  })
})
