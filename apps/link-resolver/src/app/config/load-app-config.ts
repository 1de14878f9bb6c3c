import { readFile } from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import { z } from "zod/mini"
import { type DeepPartial, withOverrides } from "../../lib/overrides"
import { ConfigError } from "./config-error"
import { type AppConfig, type EnvConfig, envSchema } from "./schema"

type RawEnv = Record<string, string>

export function mapEnvToConfig(env: EnvConfig): AppConfig {
  return {
    app: {
      env: env.APP_ENV,
    },
    server: {
      host: env.SERVER_HOST,
      port: env.SERVER_PORT,
      shutdownTimeoutMs: env.SERVER_SHUTDOWN_TIMEOUT_MS,
      livenessPath: env.SERVER_LIVENESS_PATH,
      readinessPath: env.SERVER_READINESS_PATH,
      readinessCheckTimeoutMs: env.SERVER_READINESS_CHECK_TIMEOUT_MS,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
    requestId: {
      enabled: env.REQUEST_ID_ENABLED,
      header: env.REQUEST_ID_HEADER,
      fallbackToTraceparent: env.REQUEST_ID_FALLBACK_TO_TRACEPARENT,
    },
    requestLogging: {
      enabled: env.REQUEST_LOGGING_ENABLED,
      level: env.REQUEST_LOGGING_LEVEL,
    },
    links: {
      fetchTimeoutMs: env.FETCH_TIMEOUT_MS,
      cache: {
        backend: env.LINK_CACHE_BACKEND,
        ttlSeconds: env.LINK_CACHE_TTL_SECONDS,
        memoryMaxEntries: env.LINK_CACHE_MEMORY_MAX_ENTRIES,
      },
      browser: {
        targetUrlTemplate: env.TARGET_URL_TEMPLATE,
        downloadsDir: env.DOWNLOADS_DIR,
        navigationTimeoutMs: env.BROWSER_NAVIGATION_TIMEOUT_MS,
        settleMs: env.BROWSER_SETTLE_MS,
        downloadTimeoutMs: env.BROWSER_DOWNLOAD_TIMEOUT_MS,
        controlLabel: env.DOWNLOAD_CONTROL_LABEL,
        ...(env.BROWSER_EXECUTABLE_PATH !== undefined && {
          executablePath: env.BROWSER_EXECUTABLE_PATH,
        }),
      },
      upload: {
        rcloneBin: env.RCLONE_BIN,
        remote: env.RCLONE_REMOTE,
        remoteFolder: env.RCLONE_REMOTE_FOLDER,
        timeoutMs: env.RCLONE_TIMEOUT_MS,
      },
    },
    redis: {
      url: env.REDIS_URL,
      keyPrefix: env.REDIS_KEY_PREFIX,
    },
  }
}

/**
 * Settings come from `.env.<NODE_ENV>` in `cwd` (optional), then `env`. A
 * variable set in `env` wins over the file.
 */
export async function loadAppConfig(
  env: NodeJS.ProcessEnv,
  overrides?: DeepPartial<AppConfig>,
  cwd: string = process.cwd(),
): Promise<AppConfig> {
  const fromFile = await readEnvFile(path.join(cwd, `.env.${env.NODE_ENV ?? "development"}`))
  const result = envSchema.safeParse({ ...fromFile, ...definedValues(env) })

  if (!result.success) throw ConfigError.invalid(z.prettifyError(result.error))

  return withOverrides(mapEnvToConfig(result.data), overrides)
}

async function readEnvFile(file: string): Promise<RawEnv> {
  try {
    return parse(await readFile(file, "utf8"))
  } catch (err) {
    if (isMissingFile(err)) return {}

    throw ConfigError.unreadable(file, err)
  }
}

function definedValues(env: NodeJS.ProcessEnv): RawEnv {
  const values: RawEnv = {}

  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) values[key] = value
  }

  return values
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
