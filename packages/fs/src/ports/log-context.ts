export type LogContext = {
  service: string
  module: string

  bucket: string
  key: string
  range: string

  method: string
  path: string
  status: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
