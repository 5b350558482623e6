import { createNullLogger, NullLogger } from "../null-logger"

describe("NullLogger", () => {
  it("accepts every level without side effects", () => {
    const logger = new NullLogger()
    const write = vi.spyOn(process.stdout, "write")

    logger.trace("x")
    logger.debug("x")
    logger.info("x", { operation: "load" })
    logger.warn("x")
    logger.error("x", { err: new Error("boom") })
    logger.fatal("x")

    expect(write).not.toHaveBeenCalled()
  })

  it("child() yields another no-op logger", () => {
    const child = createNullLogger().child({ operation: "commit" })

    expect(child).toBeInstanceOf(NullLogger)
    expect(() => child.info("x")).not.toThrow()
  })
})
