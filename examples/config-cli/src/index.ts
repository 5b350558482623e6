export { loadCliConfig, mapEnvToConfig } from "./app/config/load-cli-config"
export type { CliConfig, EnvConfig } from "./app/config/schema"
export { createCliContext } from "./app/create-context"
export type { CliContext, CliContextOptions, Output } from "./app/create-context"
export { buildProgram } from "./cli/build-program"
export { run } from "./cli/run"
