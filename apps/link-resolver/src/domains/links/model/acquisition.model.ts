import type { DurableLink, ItemId } from "./link.model"

export const acquisitionFailureKinds = [
  "not_found",
  "automation_timeout",
  "upload_failed",
  "unknown",
] as const

export type AcquisitionFailureKind = (typeof acquisitionFailureKinds)[number]

export type AcquisitionResolved = {
  readonly kind: "resolved"
  readonly link: DurableLink
}

export type AcquisitionFailed = {
  readonly kind: "failed"
  readonly errorKind: AcquisitionFailureKind
  readonly detail: string
}

/** Never persisted when failed. */
export type AcquisitionResult = AcquisitionResolved | AcquisitionFailed

/**
 * What one flight hands to every waiter. The cache write happens inside the
 * flight, so its outcome is shared too.
 */
export type SettledAcquisition = {
  readonly result: AcquisitionResult
  readonly cacheWriteFailed: boolean
}

export type DownloadedArtifact = {
  /** Absolute path of the local file. */
  path: string
  filename: string
}

export interface ArtifactDownloader {
  /** Rejects with an AcquisitionError when the failure kind is known. */
  download(itemId: ItemId): Promise<DownloadedArtifact>
}

export interface ArtifactUploader {
  /** Resolves to a public link for the uploaded file. */
  upload(artifact: DownloadedArtifact): Promise<DurableLink>
}

export interface AcquisitionPipeline {
  /** Never rejects. */
  acquire(itemId: ItemId): Promise<AcquisitionResult>
}
