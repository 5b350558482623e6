import { createDocument, withRoot } from "../document"
import { mappingFromPlain, toPlain } from "../value/plain"

describe("withRoot", () => {
  it("returns a new frozen document and leaves the original alone", () => {
    const doc = createDocument(mappingFromPlain({ a: 1 }), "toml", "app.toml")

    const next = withRoot(doc, mappingFromPlain({ a: 2 }))

    expect(next).not.toBe(doc)
    expect(Object.isFrozen(next)).toBe(true)
    expect({ format: next.format, origin: next.origin }).toEqual({ format: "toml", origin: "app.toml" })
    expect(toPlain(doc.root)).toEqual({ a: 1 })
    expect(toPlain(next.root)).toEqual({ a: 2 })
  })
})
