/** Looks up an environment variable. `undefined` means unset. */
export type EnvLookup = (name: string) => string | undefined

export type EnvRecord = Readonly<Record<string, string | undefined>>
