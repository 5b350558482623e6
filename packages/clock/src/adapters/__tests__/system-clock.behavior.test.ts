import { SystemClock } from "../system-clock"

describe("SystemClock behavior", () => {
  it("nowMs() tracks Date.now()", () => {
    const before = Date.now()
    const value = new SystemClock().nowMs()

    expect(value).toBeGreaterThanOrEqual(before)
    expect(value - before).toBeLessThan(1000)
  })

  describe("sleep", () => {
    it("waits at least roughly the requested duration", async () => {
      const clock = new SystemClock()
      const start = Date.now()
      await clock.sleep(40)

      expect(Date.now() - start).toBeGreaterThanOrEqual(35)
    })

    it("returns once the signal aborts mid-sleep", async () => {
      const clock = new SystemClock()
      const ac = new AbortController()
      const start = Date.now()

      const pending = clock.sleep(5000, ac.signal)
      setTimeout(() => ac.abort(), 20)
      await pending

      expect(Date.now() - start).toBeLessThan(1000)
    })

    it("clears the pending timer on abort", async () => {
      const clearSpy = vi.spyOn(globalThis, "clearTimeout")
      const clock = new SystemClock()
      const ac = new AbortController()

      const pending = clock.sleep(5000, ac.signal)
      ac.abort()
      await pending

      expect(clearSpy).toHaveBeenCalled()
    })

    it("detaches its abort listener after a normal wake-up", async () => {
      const clock = new SystemClock()
      const ac = new AbortController()
      const removeSpy = vi.spyOn(ac.signal, "removeEventListener")

      await clock.sleep(5, ac.signal)

      expect(removeSpy).toHaveBeenCalledWith("abort", expect.any(Function))
    })
  })
})
