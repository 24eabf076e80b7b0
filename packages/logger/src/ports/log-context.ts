/**
 * Fields a settings consumer typically binds to a logger.
 *
 * `key` and `origin` identify the setting, `line` its declaration line when
 * known, `operation` the conversion being performed (e.g. "path", "glob").
 */
export type LogContext = {
  key: string
  origin: string
  line: number

  module: string
  operation: string
  service: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
