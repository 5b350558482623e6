import { SystemClock } from "@tessera/clock"
import type { Lock, LockKey } from "../lock"
import type { LockLease } from "../lock-lease"
import type { LockTtl } from "../options"

export type LockHarness = {
  name: string
  make: () => Promise<{
    lock: Lock
    close?: () => Promise<void>
  }>
  ttl: () => LockTtl
  defaultTimeoutMs: () => number
}

const pause = (ms: number) => new SystemClock().sleep(ms)

function held(lease: LockLease | null): LockLease {
  if (!lease) throw new Error("expected the lock to be acquired")
  return lease
}

export function describeLockContract(h: LockHarness) {
  describe(`${h.name} (Lock contract)`, () => {
    let lock: Lock
    let close: (() => Promise<void>) | undefined

    beforeEach(async () => {
      const made = await h.make()
      lock = made.lock
      close = made.close
    })

    afterEach(async () => {
      await close?.()
    })

    describe("tryAcquire", () => {
      it("excludes a second holder until released", async () => {
        const key: LockKey = "contract:mutex"

        const a = held(await lock.tryAcquire(key, { ttl: h.ttl() }))
        expect(a.key).toBe(key)
        expect(await lock.tryAcquire(key, { ttl: h.ttl() })).toBeNull()

        await a.release()

        const c = held(await lock.tryAcquire(key, { ttl: h.ttl() }))
        await c.release()
      })

      it("release is idempotent", async () => {
        const lease = held(await lock.tryAcquire("contract:idempotent", { ttl: h.ttl() }))

        await lease.release()
        await lease.release()

        const again = held(await lock.tryAcquire("contract:idempotent", { ttl: h.ttl() }))
        await again.release()
      })

      it("a stale lease's release does not free the next holder", async () => {
        const first = held(await lock.tryAcquire("contract:stale-release", { ttl: { milliseconds: 30 } }))
        await pause(60)

        const second = held(await lock.tryAcquire("contract:stale-release", { ttl: h.ttl() }))
        await first.release()

        expect(await lock.tryAcquire("contract:stale-release", { ttl: h.ttl() })).toBeNull()
        await second.release()
      })

      it("extend succeeds while held and fails after release", async () => {
        const lease = held(await lock.tryAcquire("contract:extend", { ttl: h.ttl() }))

        expect(await lease.extend(h.ttl())).toBe(true)
        await lease.release()
        expect(await lease.extend(h.ttl())).toBe(false)
      })

      it("frees the key once the TTL lapses", async () => {
        held(await lock.tryAcquire("contract:ttl-expiry", { ttl: { milliseconds: 30 } }))

        await pause(60)

        const next = held(await lock.tryAcquire("contract:ttl-expiry", { ttl: h.ttl() }))
        await next.release()
      })

      it("keys are independent", async () => {
        const a = held(await lock.tryAcquire("key:a", { ttl: h.ttl() }))
        const b = held(await lock.tryAcquire("key:b", { ttl: h.ttl() }))

        await a.release()
        await b.release()
      })

      it("rejects a zero TTL", async () => {
        await expect(lock.tryAcquire("contract:zero-ttl", { ttl: { milliseconds: 0 } })).rejects.toThrow(/ttl/)
      })
    })

    describe("acquire", () => {
      it("timeoutMs=0 makes a single attempt", async () => {
        const key: LockKey = "contract:oneshot"
        const first = held(await lock.tryAcquire(key, { ttl: h.ttl() }))

        expect(await lock.acquire(key, { ttl: h.ttl(), timeoutMs: 0 })).toBeNull()

        await first.release()
      })

      it.each([Number.POSITIVE_INFINITY, -1])("rejects timeoutMs=%s", async (timeoutMs) => {
        await expect(lock.acquire("contract:bad-timeout", { ttl: h.ttl(), timeoutMs })).rejects.toThrow(/timeoutMs/)
      })

      it("waits for the holder to release", async () => {
        const key: LockKey = "contract:wait"
        const first = held(await lock.tryAcquire(key, { ttl: h.ttl() }))

        const pending = lock.acquire(key, { ttl: h.ttl(), timeoutMs: 1_000 })
        await pause(40)
        await first.release()

        const second = held(await pending)
        await second.release()
      })

      it("returns null for an already aborted signal", async () => {
        const key: LockKey = "contract:abort"
        const first = held(await lock.tryAcquire(key, { ttl: h.ttl() }))
        const ac = new AbortController()
        ac.abort()

        expect(await lock.acquire(key, { ttl: h.ttl(), timeoutMs: 250, signal: ac.signal })).toBeNull()

        await first.release()
      })

      it("returns null when aborted mid-wait", async () => {
        const key: LockKey = "contract:abort-mid"
        const first = held(await lock.tryAcquire(key, { ttl: h.ttl() }))
        const ac = new AbortController()

        const pending = lock.acquire(key, { ttl: h.ttl(), timeoutMs: 2_000, signal: ac.signal })
        await pause(40)
        ac.abort()

        expect(await pending).toBeNull()
        await first.release()
      })

      it("returns null after the timeout", async () => {
        const key: LockKey = "contract:timeout"
        const first = held(await lock.tryAcquire(key, { ttl: h.ttl() }))

        expect(await lock.acquire(key, { ttl: h.ttl(), timeoutMs: 50 })).toBeNull()

        await first.release()
      })

      it("falls back to defaultTimeoutMs", async () => {
        const key: LockKey = "contract:default-timeout"
        const expected = h.defaultTimeoutMs()
        const first = held(await lock.tryAcquire(key, { ttl: h.ttl() }))

        const start = Date.now()
        const lease = await lock.acquire(key, { ttl: h.ttl() })
        const elapsed = Date.now() - start

        expect(lease).toBeNull()
        expect(elapsed).toBeGreaterThanOrEqual(expected * 0.8)
        expect(elapsed).toBeLessThan(expected * 4)

        await first.release()
      })
    })
  })
}
