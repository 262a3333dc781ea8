export type LogContext = {
  service: string
  module: string
  operation: string

  file: string
  configId: string
  variable: string
  source: string
}

export type LogEvent = {
  err: unknown
}

type Loose<T> = { [K in keyof T]?: T[K] | undefined }

/** Per-call fields. `undefined` values are dropped from the entry. */
export type LogMeta<TContext extends LogContext = LogContext> = Loose<TContext> &
  Loose<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Loose<LogContext> & Record<string, unknown>
