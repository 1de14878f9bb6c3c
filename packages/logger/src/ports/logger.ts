/** Field names shared across modules, so log queries can rely on them. */
export type LogFields = {
  service: string
  env: string
  module: string
  requestId: string
  itemId: string
  durationMs: number
  err: unknown
}

export type LogMeta = Partial<LogFields> & Record<string, unknown>

export interface Logger {
  trace(message: string, meta?: LogMeta): void
  debug(message: string, meta?: LogMeta): void
  info(message: string, meta?: LogMeta): void
  warn(message: string, meta?: LogMeta): void
  error(message: string, meta?: LogMeta): void
  fatal(message: string, meta?: LogMeta): void

  /** Binds fields to every entry of the returned logger. Per-call meta wins. */
  child(bindings: LogMeta): Logger
}
