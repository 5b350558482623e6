import type { ConfigSource } from "../../ports/source"
import type { ConfigMapping } from "../../ports/value"
import { mappingFromPlain } from "../../core/value/plain"

/** In-process values, typically programmatic overrides or test fixtures. */
export class ObjectSource implements ConfigSource {
  private readonly value: ConfigMapping

  constructor(
    value: ConfigMapping | Readonly<Record<string, unknown>>,
    readonly name = "object:overrides",
  ) {
    this.value = isConfigMapping(value) ? value : mappingFromPlain(value)
  }

  async load(): Promise<ConfigMapping> {
    return this.value
  }
}

function isConfigMapping(value: object): value is ConfigMapping {
  return Reflect.get(value, "kind") === "mapping" && Reflect.get(value, "entries") instanceof Map
}
