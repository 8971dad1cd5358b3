export type LogContext = {
  service: string
  module: string
  env: string

  /** Transport adapter handling the delivery, e.g. "smtp" */
  transport: string
  mode: "batch" | "serial"
  recipient: string
  subject: string
  messageId: string
}

export type LogEvent = {
  err: unknown
  durationMs: number
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
