import type { Logger } from "@durable-links/logger"

export type ServerContextVariables = {
  requestId: string
  logger: Logger
}

declare module "hono" {
  interface ContextVariableMap extends ServerContextVariables {}
}
