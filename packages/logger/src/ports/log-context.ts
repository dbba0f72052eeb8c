/**
 * Fields that scope a logger to one part of the engine.
 */
export type LogContext = {
  service: string
  module: string
  env: string

  /** e.g. "cuckoo-table", "replicated-table" */
  component: string

  /** Caller-chosen name of a table instance */
  table: string
}

/**
 * Fields describing a single table event.
 */
export type LogEvent = {
  err: unknown

  reason: string
  fromCapacity: number
  toCapacity: number
  size: number
  functionCount: number
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
