import type { AppConfig } from "../../../app/config"
import type { CoreServices } from "../../../app/services/core"
import type { InfraClients } from "../../../app/services/infra"
import { MemoryLinkEntries } from "../infra/memory-link-entries"
import { RedisLinkEntries } from "../infra/redis-link-entries"
import type { LinkEntryStore } from "../model/link.model"
import { AcquisitionCoordinator } from "../services/acquisition-coordinator"
import { LinkAcquisitionPipeline } from "../services/acquisition-pipeline"
import { FetchOrchestrator } from "../services/fetch-orchestrator"
import { LinkCacheStore } from "../services/link-cache-store"

export type LinkServices = {
  orchestrator: FetchOrchestrator
  store: LinkCacheStore
  coordinator: AcquisitionCoordinator
  pipeline: LinkAcquisitionPipeline
}

export function createLinkServices(
  config: AppConfig,
  core: CoreServices,
  infra: InfraClients,
): LinkServices {
  const logger = core.logger.child({ module: "links" })

  const store = new LinkCacheStore(
    { entries: createLinkEntryStore(config, core, infra), clock: core.clock },
    { defaultTtlSeconds: config.links.cache.ttlSeconds },
  )

  const coordinator = new AcquisitionCoordinator({ clock: core.clock, logger })

  const pipeline = new LinkAcquisitionPipeline({
    downloader: infra.downloader,
    uploader: infra.uploader,
    clock: core.clock,
    logger,
  })

  const orchestrator = new FetchOrchestrator(
    { clock: core.clock, logger, store, coordinator, pipeline },
    { timeoutMs: config.links.fetchTimeoutMs },
  )

  return { orchestrator, store, coordinator, pipeline }
}

function createLinkEntryStore(
  config: AppConfig,
  core: CoreServices,
  infra: InfraClients,
): LinkEntryStore {
  if (config.links.cache.backend === "memory") {
    return new MemoryLinkEntries(core.clock, {
      maxEntries: config.links.cache.memoryMaxEntries,
    })
  }

  return new RedisLinkEntries(infra.redisClient, { keyPrefix: config.redis.keyPrefix })
}
