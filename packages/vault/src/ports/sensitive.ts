import type { FieldPath } from "@tessera/config"

/** Decides which fields hold secrets. */
export interface SensitiveMarker {
  matches(path: FieldPath): boolean
}
