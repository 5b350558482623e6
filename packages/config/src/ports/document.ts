import type { ConfigMapping } from "./value"

export const configFormats = ["json", "yaml", "toml", "ini"] as const

export type ConfigFormat = (typeof configFormats)[number]

/** A parsed configuration file. Frozen; edits go through `withRoot`. */
export type ConfigDocument = {
  readonly root: ConfigMapping
  readonly format: ConfigFormat
  /** File path or logical name the text came from. */
  readonly origin: string
}
