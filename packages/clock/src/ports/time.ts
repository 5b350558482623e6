/** Duration or instant in milliseconds. */
export type Milliseconds = number

export type Seconds = number

/** Instant in milliseconds since the Unix epoch. */
export type EpochMs = Milliseconds
