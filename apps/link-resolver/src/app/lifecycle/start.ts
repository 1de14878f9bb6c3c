import type { LifecycleHook } from "@durable-links/server"
import type { AppContext } from "../create-context"

export function createStartHooks(context: AppContext): LifecycleHook[] {
  if (context.config.links.cache.backend !== "redis") return []

  return [
    {
      name: "start:redis",
      run: async () => {
        await context.infra.redisClient.connect()
      },
    },
  ]
}

export type CreateStartHooksFn = typeof createStartHooks
