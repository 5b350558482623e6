import { BaseError } from "../../base-error"
import { describeError, errorChain } from "../error-chain"

describe("errorChain", () => {
  it("returns a single entry for an error without cause", () => {
    const err = new Error("solo")

    expect(errorChain(err)).toEqual([err])
  })

  it("walks nested causes outermost first", () => {
    const root = new Error("root")
    const middle = new BaseError("middle", { code: "middle", cause: root })
    const outer = new Error("outer", { cause: middle })

    expect(errorChain(outer)).toEqual([outer, middle, root])
  })

  it("includes non-Error causes", () => {
    const err = new Error("wrapper", { cause: "string cause" })

    expect(errorChain(err)).toEqual([err, "string cause"])
  })

  it("stops on cycles", () => {
    const a = new Error("a")
    const b = new Error("b", { cause: a })
    Object.defineProperty(a, "cause", { value: b })

    expect(errorChain(b)).toEqual([b, a])
  })

  it("respects maxDepth", () => {
    let err = new Error("0")
    for (let i = 1; i < 10; i++) err = new Error(String(i), { cause: err })

    expect(errorChain(err, 3)).toHaveLength(3)
  })

  it("returns an empty chain for nullish input", () => {
    expect(errorChain(null)).toEqual([])
    expect(errorChain(undefined)).toEqual([])
  })
})

describe("describeError", () => {
  it("joins messages along the chain", () => {
    const err = new Error("cannot load settings.yaml", { cause: new Error("line 3: bad indent") })

    expect(describeError(err)).toBe("cannot load settings.yaml <- line 3: bad indent")
  })

  it("accepts a custom separator", () => {
    const err = new Error("a", { cause: "b" })

    expect(describeError(err, ": ")).toBe("a: b")
  })
})
