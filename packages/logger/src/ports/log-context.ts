/**
 * Fields the cache binds to its loggers. Every field is optional at a call
 * site; child loggers fix the ones that stay constant for their scope.
 */
export type LogContext = {
  service: string

  /** Component emitting the entry, e.g. "memory-tier", "bulk-tier". */
  module: string

  datasetId: string
  key: string
  path: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
