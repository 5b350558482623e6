/** Mapping key or sequence index. */
export type PathSegment = string | number

/** Location of a node in a tree, root first. The empty path is the root. */
export type FieldPath = readonly PathSegment[]

/** Matches any single key in path patterns such as `services.*.password`. */
export const WILDCARD = "*"
