import type { ReadinessCheck } from "@durable-links/server"
import type { AppContext } from "../create-context"

export function createReadinessChecks(context: AppContext): ReadinessCheck[] {
  if (context.config.links.cache.backend !== "redis") return []

  const { redisClient } = context.infra

  return [
    {
      name: "redis",
      check: async () => {
        if (!redisClient.isReady) return false

        await redisClient.ping()

        return true
      },
    },
  ]
}
