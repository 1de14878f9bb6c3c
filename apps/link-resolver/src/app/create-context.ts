import { fileURLToPath } from "node:url"
import type { DeepPartial } from "../lib/overrides"
import { type AppConfig, loadAppConfig } from "./config"
import { type CreateStartHooksFn, createStartHooks } from "./lifecycle/start"
import { type CreateStopHooksFn, createStopHooks } from "./lifecycle/stop"
import { type RegisterRoutesFn, registerRoutes } from "./routes/register-routes"
import { type AppServices, createDefaultDomainServices } from "./services"
import { type CoreServices, createCoreServices } from "./services/core"
import { createDefaultInfraClients, type InfraClients } from "./services/infra"

export type AppContextOptions = {
  env?: NodeJS.ProcessEnv
  configOverrides?: DeepPartial<AppConfig>

  /** Replace whole services, such as the clock or the downloader. */
  coreOverrides?: Partial<CoreServices>
  infraOverrides?: Partial<InfraClients>
}

export type AppContext = {
  config: AppConfig
  infra: InfraClients
  services: AppServices
  registerRoutes: RegisterRoutesFn
  createStartHooks: CreateStartHooksFn
  createStopHooks: CreateStopHooksFn
}

export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const projectRoot = fileURLToPath(new URL("../..", import.meta.url))

  const config = await loadAppConfig(
    options.env ?? process.env,
    options.configOverrides,
    projectRoot,
  )

  const core: CoreServices = { ...createCoreServices(config), ...options.coreOverrides }
  const infra: InfraClients = {
    ...createDefaultInfraClients(config, core),
    ...options.infraOverrides,
  }
  const domains = createDefaultDomainServices(config, infra, core)

  return {
    config,
    infra,
    services: { core, domains },
    registerRoutes,
    createStartHooks,
    createStopHooks,
  }
}
