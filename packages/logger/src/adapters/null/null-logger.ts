import type { Logger, LogMeta } from "../../ports/logger"

export class NullLogger implements Logger {
  trace(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  fatal(): void {}

  child(_bindings: LogMeta): Logger {
    return this
  }
}
