import pino, { type DestinationStream, type Logger as Pino } from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogLevelName } from "../../ports/log-level"
import type { Logger, LogMeta } from "../../ports/logger"

export type PinoLoggerOptions = {
  /** @default "info" */
  level?: LogLevelName

  /** pino-pretty output for local runs. Ignored when `destination` is set. */
  prettify?: boolean

  bindings?: LogMeta

  /** JSON lines go here instead of stdout. */
  destination?: DestinationStream
}

export class PinoLogger implements Logger {
  constructor(private readonly base: Pino) {}

  trace(message: string, meta: LogMeta = {}): void {
    this.base.trace(meta, message)
  }

  debug(message: string, meta: LogMeta = {}): void {
    this.base.debug(meta, message)
  }

  info(message: string, meta: LogMeta = {}): void {
    this.base.info(meta, message)
  }

  warn(message: string, meta: LogMeta = {}): void {
    this.base.warn(meta, message)
  }

  error(message: string, meta: LogMeta = {}): void {
    this.base.error(meta, message)
  }

  fatal(message: string, meta: LogMeta = {}): void {
    this.base.fatal(meta, message)
  }

  child(bindings: LogMeta): Logger {
    return new PinoLogger(this.base.child(bindings))
  }
}

export function createPinoLogger(opts: PinoLoggerOptions = {}): Logger {
  const level = opts.level ?? "info"
  const serializers = { err: errWithCause }

  const root = opts.destination
    ? pino({ level, serializers }, opts.destination)
    : pino({
        level,
        serializers,
        ...(opts.prettify && {
          transport: {
            target: "pino-pretty",
            options: { colorize: true, translateTime: "HH:MM:ss.l", ignore: "pid,hostname" },
          },
        }),
      })

  return new PinoLogger(opts.bindings ? root.child(opts.bindings) : root)
}
