import type { EnvRecord } from "../../ports/env"
import type { ConfigSource } from "../../ports/source"
import type { ConfigMapping, ConfigValue } from "../../ports/value"
import { configString, mapping } from "../../core/value/value"

export interface EnvSourceOptions {
  /** Only variables starting with this are read; it is stripped from the key. */
  prefix?: string
  /** Nesting separator inside variable names. Default: `"__"` */
  separator?: string
  /** Default: `process.env` */
  env?: EnvRecord
}

type Node = { value?: string; children: Map<string, Node> }

/**
 * Environment variables as a tree: with prefix `APP_`, `APP_DB__HOST=x`
 * becomes `{ db: { host: "x" } }`. Segments are lowercased and values stay
 * strings. When a variable names a path below another variable's value,
 * the nested form wins.
 */
export class EnvSource implements ConfigSource {
  readonly name: string
  private readonly prefix: string
  private readonly separator: string

  constructor(private readonly options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.separator = options.separator ?? "__"
    this.name = this.prefix ? `env:${this.prefix}` : "env"
  }

  async load(): Promise<ConfigMapping> {
    const env = this.options.env ?? process.env
    const root: Node = { children: new Map() }

    const names = Object.keys(env)
      .filter((name) => name.startsWith(this.prefix) && name.length > this.prefix.length)
      .sort()

    for (const name of names) {
      const raw = env[name]
      if (raw === undefined) continue

      const segments = name
        .slice(this.prefix.length)
        .split(this.separator)
        .map((s) => s.toLowerCase())
      if (segments.some((s) => s === "")) continue

      let node = root
      for (const segment of segments) {
        let child = node.children.get(segment)
        if (!child) {
          child = { children: new Map() }
          node.children.set(segment, child)
        }
        node = child
      }
      node.value = raw
    }

    return toMapping(root)
  }
}

function toValue(node: Node): ConfigValue {
  if (node.children.size > 0) return toMapping(node)
  return configString(node.value ?? "")
}

function toMapping(node: Node): ConfigMapping {
  return mapping([...node.children].map(([key, child]) => [key, toValue(child)] as const))
}
