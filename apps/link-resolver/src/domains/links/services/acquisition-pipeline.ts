import { rm } from "node:fs/promises"
import type { Clock } from "@durable-links/clock"
import { errorMessage, isAppError } from "@durable-links/errors"
import type { Logger } from "@durable-links/logger"
import {
  type AcquisitionFailureKind,
  type AcquisitionPipeline,
  type AcquisitionResult,
  acquisitionFailureKinds,
  type ArtifactDownloader,
  type ArtifactUploader,
  type DownloadedArtifact,
} from "../model/acquisition.model"
import type { ItemId } from "../model/link.model"

export type RemoveArtifactFn = (path: string) => Promise<void>

export type LinkAcquisitionPipelineDeps = {
  downloader: ArtifactDownloader
  uploader: ArtifactUploader
  clock: Clock
  logger: Logger
  removeArtifact?: RemoveArtifactFn
}

/** Download, then upload; the local artifact is removed either way. */
export class LinkAcquisitionPipeline implements AcquisitionPipeline {
  private readonly removeArtifact: RemoveArtifactFn

  public constructor(private readonly deps: LinkAcquisitionPipelineDeps) {
    this.removeArtifact = deps.removeArtifact ?? ((path) => rm(path, { force: true }))
  }

  async acquire(itemId: ItemId): Promise<AcquisitionResult> {
    const logger = this.deps.logger.child({ itemId })
    const start = this.deps.clock.nowMs()

    let artifact: DownloadedArtifact

    try {
      artifact = await this.deps.downloader.download(itemId)
    } catch (err) {
      return this.failed(logger, "download", err)
    }

    logger.debug("Artifact downloaded", { filename: artifact.filename })

    try {
      const link = await this.deps.uploader.upload(artifact)

      logger.info("Artifact uploaded", {
        filename: artifact.filename,
        durationMs: this.deps.clock.nowMs() - start,
      })

      return { kind: "resolved", link }
    } catch (err) {
      return this.failed(logger, "upload", err)
    } finally {
      await this.cleanup(logger, artifact)
    }
  }

  private failed(logger: Logger, step: string, err: unknown): AcquisitionResult {
    const errorKind = classify(err)

    logger.warn(`Acquisition ${step} failed`, { failureKind: errorKind, err })

    return { kind: "failed", errorKind, detail: errorMessage(err) }
  }

  private async cleanup(logger: Logger, artifact: DownloadedArtifact): Promise<void> {
    try {
      await this.removeArtifact(artifact.path)
    } catch (err) {
      logger.warn("Failed to remove local artifact", { path: artifact.path, err })
    }
  }
}

function classify(err: unknown): AcquisitionFailureKind {
  if (!isAppError(err)) return "unknown"

  return acquisitionFailureKinds.find((kind) => kind === err.code) ?? "unknown"
}
