import type { Milliseconds } from "@durable-links/clock"
import { BaseError } from "@durable-links/errors"
import type { AcquisitionFailed, AcquisitionFailureKind } from "./acquisition.model"
import type { ItemId } from "./link.model"

export type FetchErrorCode = "invalid_input" | "fetch_timeout" | "pipeline_failure"

export class FetchError extends BaseError<FetchErrorCode> {
  static invalidInput(reason: string): FetchError {
    return new FetchError(reason, {
      code: "invalid_input",
      isRetryable: false,
    })
  }

  /** The flight keeps running; a later request may find the link cached. */
  static timeout(itemId: ItemId, timeoutMs: Milliseconds): FetchError {
    return new FetchError(`Timed out after ${timeoutMs}ms resolving ${itemId}`, {
      code: "fetch_timeout",
      context: { itemId, timeoutMs },
      isRetryable: true,
    })
  }

  static pipelineFailure(itemId: ItemId, failure: AcquisitionFailed): FetchError {
    return new FetchError(`Acquisition failed for ${itemId}: ${failure.detail}`, {
      code: "pipeline_failure",
      context: { itemId, failureKind: failure.errorKind, detail: failure.detail },
      isRetryable: failure.errorKind !== "not_found",
    })
  }
}

export type LinkStoreErrorCode = "link_store_read_failed" | "link_store_write_failed"

export class LinkStoreError extends BaseError<LinkStoreErrorCode> {
  static readFailed(itemId: ItemId, cause: unknown): LinkStoreError {
    return new LinkStoreError(`Failed to read cached link for ${itemId}`, {
      code: "link_store_read_failed",
      context: { itemId },
      cause,
      isRetryable: true,
    })
  }

  static writeFailed(itemId: ItemId, cause: unknown): LinkStoreError {
    return new LinkStoreError(`Failed to cache link for ${itemId}`, {
      code: "link_store_write_failed",
      context: { itemId },
      cause,
      isRetryable: true,
    })
  }
}

/** Thrown by downloaders and uploaders; the code is the failure kind. */
export class AcquisitionError extends BaseError<AcquisitionFailureKind> {
  static notFound(detail: string, context: Record<string, unknown> = {}): AcquisitionError {
    return new AcquisitionError(detail, { code: "not_found", context })
  }

  static automationTimeout(detail: string, cause?: unknown): AcquisitionError {
    return new AcquisitionError(detail, {
      code: "automation_timeout",
      cause,
      isRetryable: true,
    })
  }

  static uploadFailed(detail: string, cause?: unknown): AcquisitionError {
    return new AcquisitionError(detail, { code: "upload_failed", cause, isRetryable: true })
  }

  static unknown(detail: string, cause?: unknown): AcquisitionError {
    return new AcquisitionError(detail, { code: "unknown", cause })
  }
}
