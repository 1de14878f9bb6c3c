export { ConfigError, type ConfigErrorCode } from "./config-error"
export { loadAppConfig, mapEnvToConfig } from "./load-app-config"
export { type AppConfig, type EnvConfig, envSchema, type LinkCacheBackend } from "./schema"
