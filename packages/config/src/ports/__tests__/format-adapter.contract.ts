import { fromPlain, mappingFromPlain, toPlain } from "../../core/value/plain"
import type { FormatAdapter } from "../format-adapter"

export type FormatAdapterHarness = {
  name: string
  make: () => FormatAdapter
  /** Text the adapter must reject. Omit for formats with no syntax errors. */
  malformed?: string
}

/** Strings and nested mappings survive every format unchanged. */
const portable = {
  name: "api",
  db: { host: "localhost", user: "app" },
}

export function describeFormatAdapterContract(h: FormatAdapterHarness) {
  describe(`${h.name} (FormatAdapter contract)`, () => {
    it("declares lowercase extensions with a leading dot", () => {
      const adapter = h.make()

      expect(adapter.extensions.length).toBeGreaterThan(0)
      for (const ext of adapter.extensions) expect(ext).toMatch(/^\.[a-z]+$/)
    })

    it("decodes what it encodes", () => {
      const adapter = h.make()
      const text = adapter.encode(mappingFromPlain(portable))

      expect(toPlain(fromPlain(adapter.decode(text, "contract")))).toEqual(portable)
    })

    it("encodes deterministically with a trailing newline", () => {
      const adapter = h.make()
      const a = adapter.encode(mappingFromPlain(portable))
      const b = adapter.encode(mappingFromPlain({ ...portable }))

      expect(a).toBe(b)
      expect(a.endsWith("\n")).toBe(true)
    })

    if (h.malformed !== undefined) {
      const malformed = h.malformed

      it("reports malformed text as a syntax error naming the origin", () => {
        const adapter = h.make()

        let thrown: unknown
        try {
          adapter.decode(malformed, "broken.conf")
        } catch (err) {
          thrown = err
        }

        expect(thrown).toMatchObject({ code: "syntax_error", message: expect.stringMatching(/^broken\.conf: /) })
      })
    }
  })
}
