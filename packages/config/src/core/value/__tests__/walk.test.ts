import { fromPlain, toPlain } from "../plain"
import { formatPath } from "../path"
import { configString } from "../value"
import { mapLeaves, walk } from "../walk"

describe("mapLeaves", () => {
  it("rewrites scalars with their paths", () => {
    const tree = fromPlain({ db: { host: "h" }, hosts: ["a", "b"] })
    const seen: string[] = []

    const next = mapLeaves(tree, (leaf, path) => {
      seen.push(formatPath(path))
      return leaf.kind === "string" ? configString(leaf.value.toUpperCase()) : leaf
    })

    expect(seen).toEqual(["db.host", "hosts[0]", "hosts[1]"])
    expect(toPlain(next)).toEqual({ db: { host: "H" }, hosts: ["A", "B"] })
  })

  it("reuses subtrees whose leaves did not change", () => {
    const tree = fromPlain({ a: { b: 1 }, c: "x" })

    expect(mapLeaves(tree, (leaf) => leaf)).toBe(tree)
  })
})

describe("walk", () => {
  it("visits parents before children", () => {
    const paths = [...walk(fromPlain({ a: { b: [1] } }))].map(([path]) => formatPath(path))

    expect(paths).toEqual(["", "a", "a.b", "a.b[0]"])
  })
})
