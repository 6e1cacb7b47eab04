/**
 * Well-known fields carried by KV log entries.
 *
 * @remarks
 * Every field is optional at the call site: loggers are scoped with `child()`
 * as a handle is opened (`namespace`) and per host call (`operation`, `key`).
 */
export type LogContext = {
  namespace: string
  operation: string
  key: string
  prefix: string
  cursor: string

  durationMs: number
  outcome: string
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
