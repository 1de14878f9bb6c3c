import {
  chromiumLauncher,
  PlaywrightDownloader,
} from "../../domains/links/infra/playwright-downloader"
import { RcloneUploader, runCommand } from "../../domains/links/infra/rclone-uploader"
import { createRedisClient, type RedisClient } from "../../domains/links/infra/redis-client"
import type {
  ArtifactDownloader,
  ArtifactUploader,
} from "../../domains/links/model/acquisition.model"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"

export type InfraClients = {
  redisClient: RedisClient
  downloader: ArtifactDownloader
  uploader: ArtifactUploader
}

export function createDefaultInfraClients(config: AppConfig, core: CoreServices): InfraClients {
  const redisClient = createRedisClient(config.redis.url)

  redisClient.on("error", (err) => {
    core.logger.error("Redis client error", { err })
  })

  const { browser, upload } = config.links

  const downloader = new PlaywrightDownloader(
    {
      launchBrowser: chromiumLauncher(
        browser.executablePath !== undefined ? { executablePath: browser.executablePath } : {},
      ),
      clock: core.clock,
      logger: core.logger.child({ module: "downloader" }),
    },
    {
      targetUrlTemplate: browser.targetUrlTemplate,
      downloadsDir: browser.downloadsDir,
      navigationTimeoutMs: browser.navigationTimeoutMs,
      settleMs: browser.settleMs,
      downloadTimeoutMs: browser.downloadTimeoutMs,
      controlLabel: browser.controlLabel,
    },
  )

  const uploader = new RcloneUploader(
    { runCommand, logger: core.logger.child({ module: "uploader" }) },
    {
      rcloneBin: upload.rcloneBin,
      remote: upload.remote,
      remoteFolder: upload.remoteFolder,
      timeoutMs: upload.timeoutMs,
    },
  )

  return { redisClient, downloader, uploader }
}
