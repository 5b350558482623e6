import { describeKeySourceContract } from "../../../ports/__tests__/key-source.contract"
import { EnvKeySource } from "../env-key-source"

describeKeySourceContract({
  name: "EnvKeySource",
  configured: async (key) => new EnvKeySource({ env: { TESSERA_KEY: key.toString("base64") } }),
  empty: async () => new EnvKeySource({ env: {} }),
})
