export { NullLogger } from "./adapters/null/null-logger"
export { createPinoLogger, PinoLogger, type PinoLoggerOptions } from "./adapters/pino/pino-logger"
export { type LogLevelName, logLevelNames } from "./ports/log-level"
export type { LogFields, Logger, LogMeta } from "./ports/logger"
