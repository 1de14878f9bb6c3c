import "./types/context"

export {
  type ErrorBody,
  type ErrorResponse,
  type ErrorResponses,
  INTERNAL_ERROR,
} from "./errors/error-responder"
export { parseOrThrow, ValidationError, type ValidationIssue } from "./errors/validation"
export {
  type HookFailure,
  type LifecycleHook,
  ServerError,
  type ServerErrorCode,
  type StopReport,
} from "./lifecycle/hooks"
export type { ProcessSignalOptions } from "./lifecycle/signals"
export {
  type HealthOptions,
  MAX_TIMER_MS,
  type PathString,
  type ReadinessCheck,
  type RequestIdOptions,
  type ServerOptions,
} from "./options"
export {
  type Closeable,
  createServer,
  HttpServer,
  type ListenFn,
  type ServerDependencies,
} from "./server"
export type { ServerContextVariables } from "./types/context"
