import type { Milliseconds, Seconds } from "@durable-links/clock"
import { type LogLevelName, logLevelNames } from "@durable-links/logger"
import { MAX_TIMER_MS } from "@durable-links/server"
import { z } from "zod/mini"

export const linkCacheBackends = ["redis", "memory"] as const

export type LinkCacheBackend = (typeof linkCacheBackends)[number]

const wholeNumber = (max: number) =>
  z.coerce
    .number()
    .check(z.multipleOf(1, { error: "Expected a whole number" }), z.nonnegative(), z.lte(max))

/** Timers fire at once past MAX_TIMER_MS. */
const duration = () => z.coerce.number().check(z.positive(), z.lte(MAX_TIMER_MS))
const optionalDelay = () => z.coerce.number().check(z.nonnegative(), z.lte(MAX_TIMER_MS))
const count = () => z.coerce.number().check(z.multipleOf(1), z.positive())

export const envSchema = z.object({
  APP_ENV: z._default(z.string(), "development"),
  SERVICE_NAME: z._default(z.string(), "Link Resolver"),

  SERVER_HOST: z._default(z.string(), "0.0.0.0"),
  SERVER_PORT: z._default(wholeNumber(65_535), 8080),
  SERVER_SHUTDOWN_TIMEOUT_MS: z._default(duration(), 10_000),
  SERVER_LIVENESS_PATH: z._default(z.templateLiteral(["/", z.string()]), "/health/live"),
  SERVER_READINESS_PATH: z._default(z.templateLiteral(["/", z.string()]), "/health/ready"),
  SERVER_READINESS_CHECK_TIMEOUT_MS: z._default(duration(), 5_000),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),

  REQUEST_ID_ENABLED: z._default(z.stringbool(), true),
  REQUEST_ID_HEADER: z._default(z.string(), "x-request-id"),
  REQUEST_ID_FALLBACK_TO_TRACEPARENT: z._default(z.stringbool(), false),

  REQUEST_LOGGING_ENABLED: z._default(z.stringbool(), true),
  REQUEST_LOGGING_LEVEL: z._default(z.enum(logLevelNames), "info"),

  FETCH_TIMEOUT_MS: z._default(duration(), 60_000),

  LINK_CACHE_BACKEND: z._default(z.enum(linkCacheBackends), "redis"),
  LINK_CACHE_TTL_SECONDS: z._default(wholeNumber(Number.MAX_SAFE_INTEGER), 86_400),
  LINK_CACHE_MEMORY_MAX_ENTRIES: z._default(count(), 10_000),

  REDIS_URL: z._default(z.string(), "redis://localhost:6379/0"),
  REDIS_KEY_PREFIX: z._default(z.string(), "link-resolver"),

  TARGET_URL_TEMPLATE: z._default(
    z.string().check(z.includes("{id}", { error: "TARGET_URL_TEMPLATE must contain {id}" })),
    "https://downloads.example/item/{id}",
  ),
  DOWNLOADS_DIR: z._default(z.string(), "downloads"),
  BROWSER_EXECUTABLE_PATH: z.optional(z.string()),
  BROWSER_NAVIGATION_TIMEOUT_MS: z._default(duration(), 30_000),
  BROWSER_SETTLE_MS: z._default(optionalDelay(), 2_500),
  BROWSER_DOWNLOAD_TIMEOUT_MS: z._default(duration(), 15_000),
  DOWNLOAD_CONTROL_LABEL: z._default(z.string().check(z.minLength(1)), "Download"),

  RCLONE_BIN: z._default(z.string(), "rclone"),
  RCLONE_REMOTE: z._default(z.string().check(z.minLength(1)), "mega"),
  RCLONE_REMOTE_FOLDER: z._default(z.string(), "link_cache"),
  RCLONE_TIMEOUT_MS: z._default(duration(), 120_000),
})

export type EnvConfig = z.infer<typeof envSchema>

export type AppConfig = {
  app: {
    env: string
  }

  server: {
    host: string
    port: number
    shutdownTimeoutMs: Milliseconds
    livenessPath: `/${string}`
    readinessPath: `/${string}`
    readinessCheckTimeoutMs: Milliseconds
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }

  requestId: {
    enabled: boolean
    header: string
    fallbackToTraceparent: boolean
  }

  requestLogging: {
    enabled: boolean
    level: LogLevelName
  }

  links: {
    fetchTimeoutMs: Milliseconds
    cache: {
      backend: LinkCacheBackend
      /** Whole seconds. 0 disables expiry. */
      ttlSeconds: Seconds
      memoryMaxEntries: number
    }
    browser: {
      targetUrlTemplate: string
      downloadsDir: string
      executablePath?: string
      navigationTimeoutMs: Milliseconds
      settleMs: Milliseconds
      downloadTimeoutMs: Milliseconds
      controlLabel: string
    }
    upload: {
      rcloneBin: string
      remote: string
      remoteFolder: string
      timeoutMs: Milliseconds
    }
  }

  redis: {
    url: string
    keyPrefix: string
  }
}
