import type { LifecycleHook } from "@durable-links/server"
import type { AppContext } from "../create-context"

export function createStopHooks(context: AppContext): LifecycleHook[] {
  return [
    {
      name: "stop:redis",
      run: async () => {
        if (context.infra.redisClient.isOpen) await context.infra.redisClient.quit()
      },
    },
  ]
}

export type CreateStopHooksFn = typeof createStopHooks
