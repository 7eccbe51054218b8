export type LogContext = {
  service: string
  module: string
  env: string

  /** Name given to a cache instance by its host, if any. */
  cache: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Fields added to (or overriding) a logger's context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
