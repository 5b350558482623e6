import { FakeClock } from "@tessera/clock"
import { MemoryLock } from "../memory-lock"

describe("MemoryLock behavior", () => {
  it("does not keep the process alive for the TTL watchdog", async () => {
    const setTimeoutSpy = vi.spyOn(globalThis, "setTimeout")
    const lock = new MemoryLock({ clock: new FakeClock() }, { defaultTimeoutMs: 100, pollMs: 10 })

    const lease = await lock.tryAcquire("behavior:unref", { ttl: { milliseconds: 5_000 } })

    expect(setTimeoutSpy).toHaveBeenCalledTimes(1)
    const timer = setTimeoutSpy.mock.results[0]?.value
    expect(timer?.hasRef()).toBe(false)

    await lease?.release()
  })

  it("times out on a fake clock without real waiting", async () => {
    const clock = new FakeClock(0)
    const lock = new MemoryLock({ clock }, { defaultTimeoutMs: 1_000, pollMs: 100 })
    const first = await lock.tryAcquire("behavior:fake", { ttl: { milliseconds: 60_000 } })

    const second = await lock.acquire("behavior:fake", { ttl: { milliseconds: 60_000 } })

    expect(second).toBeNull()
    expect(clock.nowMs()).toBe(1_000)
    await first?.release()
  })

  it("releases automatically when the TTL timer fires", async () => {
    vi.useFakeTimers()
    try {
      const lock = new MemoryLock({ clock: new FakeClock() }, { defaultTimeoutMs: 0, pollMs: 10 })
      await lock.tryAcquire("behavior:ttl", { ttl: { milliseconds: 500 } })

      expect(await lock.tryAcquire("behavior:ttl", { ttl: { milliseconds: 500 } })).toBeNull()
      vi.advanceTimersByTime(500)
      expect(await lock.tryAcquire("behavior:ttl", { ttl: { milliseconds: 500 } })).not.toBeNull()
    } finally {
      vi.useRealTimers()
    }
  })
})
