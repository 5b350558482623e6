import { configNumber, configString, mappingFromPlain, toPlain } from "@tessera/config"
import { encryptFields, SensitiveFields } from "@tessera/vault"
import { diffTrees } from "../diff-trees"

const key = Buffer.alloc(32, 7)
const markers = new SensitiveFields({ paths: ["db.password"] })

describe("diffTrees", () => {
  it("returns nothing for equal trees", () => {
    const tree = mappingFromPlain({ db: { host: "a" }, tags: ["x"] })

    expect(diffTrees(tree, mappingFromPlain({ tags: ["x"], db: { host: "a" } }))).toEqual([])
  })

  it("reports changed, removed and added fields with their values", () => {
    const before = mappingFromPlain({ db: { host: "a", port: 5432 }, debug: true })
    const after = mappingFromPlain({ db: { host: "b" }, debug: true, region: "eu" })

    expect(diffTrees(before, after)).toEqual([
      { path: "db.host", kind: "changed", before: configString("a"), after: configString("b") },
      { path: "db.port", kind: "removed", before: configNumber(5432) },
      { path: "region", kind: "added", after: configString("eu") },
    ])
  })

  it("reports a new subtree once at its root", () => {
    const deltas = diffTrees(mappingFromPlain({}), mappingFromPlain({ cache: { ttl: 60, size: 10 } }))

    expect(deltas.map(({ path, kind }) => ({ path, kind }))).toEqual([{ path: "cache", kind: "added" }])
    expect(deltas[0]?.after && toPlain(deltas[0].after)).toEqual({ ttl: 60, size: 10 })
  })

  it("treats sequences as single values", () => {
    const deltas = diffTrees(mappingFromPlain({ hosts: ["a", "b"] }), mappingFromPlain({ hosts: ["a", "c"] }))

    expect(deltas.map((d) => d.path)).toEqual(["hosts"])
  })

  it("reports a change of kind at the node whose kind changed", () => {
    const deltas = diffTrees(mappingFromPlain({ db: { host: "a" } }), mappingFromPlain({ db: "postgres://db" }))

    expect(deltas.map(({ path, kind }) => ({ path, kind }))).toEqual([{ path: "db", kind: "changed" }])
  })

  it("compares encrypted fields by fingerprint", () => {
    const a = encryptFields(mappingFromPlain({ db: { password: "test-secret" } }), markers, key)
    const b = encryptFields(mappingFromPlain({ db: { password: "test-secret" } }), markers, key)
    const c = encryptFields(mappingFromPlain({ db: { password: "other-secret" } }), markers, key)

    expect(diffTrees(a, b, markers)).toEqual([])
    expect(diffTrees(a, c, markers)).toEqual([{ path: "db.password", kind: "changed", sensitive: true }])
  })

  it("never carries values of sensitive fields", () => {
    const before = mappingFromPlain({ db: { password: "test-secret" } })
    const after = mappingFromPlain({ db: { password: "other-secret" }, api: { token_secret: "xyz" } })

    expect(diffTrees(before, after, markers)).toEqual([
      { path: "db.password", kind: "changed", sensitive: true },
      { path: "api", kind: "added", sensitive: true },
    ])
  })

  it("hides both sides when a scalar turns into a subtree holding a sensitive field", () => {
    const pin = new SensitiveFields({ paths: ["creds.pin"] })
    const plain = mappingFromPlain({ creds: "none" })
    const nested = mappingFromPlain({ creds: { pin: 1234, user: "ops" } })

    expect(diffTrees(plain, nested, pin)).toEqual([{ path: "creds", kind: "changed", sensitive: true }])
    expect(diffTrees(nested, plain, pin)).toEqual([{ path: "creds", kind: "changed", sensitive: true }])
  })
})
