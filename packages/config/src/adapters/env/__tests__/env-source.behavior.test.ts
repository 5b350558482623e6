import { toPlain } from "../../../core/value/plain"
import { EnvSource } from "../env-source"

describe("EnvSource", () => {
  it("is named after its prefix", () => {
    expect(new EnvSource({ prefix: "APP_", env: {} }).name).toBe("env:APP_")
    expect(new EnvSource({ env: {} }).name).toBe("env")
  })

  it("lowercases segments and nests on the separator", async () => {
    const source = new EnvSource({
      prefix: "APP_",
      env: { APP_DB__HOST: "db.internal", APP_DB__PORT: "5432", APP_LOG_LEVEL: "debug" },
    })

    expect(toPlain(await source.load())).toEqual({
      db: { host: "db.internal", port: "5432" },
      log_level: "debug",
    })
  })

  it("orders keys by variable name", async () => {
    const source = new EnvSource({ prefix: "APP_", env: { APP_ZETA: "1", APP_ALPHA: "2" } })

    expect([...(await source.load()).entries.keys()]).toEqual(["alpha", "zeta"])
  })

  it("lets a nested variable replace a scalar at its parent", async () => {
    const source = new EnvSource({ prefix: "APP_", env: { APP_DB: "plain", APP_DB__HOST: "h" } })

    expect(toPlain(await source.load())).toEqual({ db: { host: "h" } })
  })

  it("skips unset variables, the bare prefix and empty segments", async () => {
    const source = new EnvSource({
      prefix: "APP_",
      env: { APP_: "x", APP_A____B: "x", APP_UNSET: undefined, APP_OK: "" },
    })

    expect(toPlain(await source.load())).toEqual({ ok: "" })
  })

  it("supports a custom separator", async () => {
    const source = new EnvSource({ prefix: "SVC.", separator: ".", env: { "SVC.CACHE.TTL": "60" } })

    expect(toPlain(await source.load())).toEqual({ cache: { ttl: "60" } })
  })
})
