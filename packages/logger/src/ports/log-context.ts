export type LogContext = {
  service: string
  module: string
  env: string

  /** Operation being performed, e.g. `"load"`, `"commit"`, `"rollback"`. */
  operation: string
  /** Source name such as `yaml:config/base.yaml`. */
  source: string
  /** Snapshot sequence number. */
  seq: number
  lockKey: string
  path: string

  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/** Fields a child logger adds to (or overrides in) its parent's context. */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
