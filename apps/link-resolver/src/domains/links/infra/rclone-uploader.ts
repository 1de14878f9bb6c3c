import { execFile } from "node:child_process"
import { promisify } from "node:util"
import type { Milliseconds } from "@durable-links/clock"
import type { Logger } from "@durable-links/logger"
import type { ArtifactUploader, DownloadedArtifact } from "../model/acquisition.model"
import { AcquisitionError } from "../model/link.errors"
import type { DurableLink } from "../model/link.model"

export type CommandOutput = { stdout: string; stderr: string }

/** Rejects on a non-zero exit, with `stderr` on the error when there was output. */
export type RunCommandFn = (
  file: string,
  args: readonly string[],
  options: { timeout: Milliseconds },
) => Promise<CommandOutput>

const execFileAsync = promisify(execFile)

export const runCommand: RunCommandFn = async (file, args, options) => {
  const { stdout, stderr } = await execFileAsync(file, [...args], {
    timeout: options.timeout,
    encoding: "utf8",
  })

  return { stdout, stderr }
}

export type RcloneUploaderOptions = {
  rcloneBin: string
  remote: string
  /** Trailing slashes are ignored; empty means the remote root. */
  remoteFolder: string
  timeoutMs: Milliseconds
}

export type RcloneUploaderDeps = {
  runCommand: RunCommandFn
  logger: Logger
}

/** `rclone copyto` the artifact, then `rclone link` it for a public URL. */
export class RcloneUploader implements ArtifactUploader {
  public constructor(
    private readonly deps: RcloneUploaderDeps,
    private readonly opts: RcloneUploaderOptions,
  ) {}

  async upload(artifact: DownloadedArtifact): Promise<DurableLink> {
    const remotePath = this.remotePath(artifact.filename)

    await this.rclone("copyto", [artifact.path, remotePath])

    const { stdout } = await this.rclone("link", [remotePath])
    const link = stdout.trim()

    if (!link) throw AcquisitionError.uploadFailed(`rclone link returned no link for ${remotePath}`)

    this.deps.logger.debug("Uploaded artifact", { remotePath })

    return link
  }

  remotePath(filename: string): string {
    const folder = this.opts.remoteFolder.replace(/\/+$/, "")

    return folder
      ? `${this.opts.remote}:${folder}/${filename}`
      : `${this.opts.remote}:${filename}`
  }

  private async rclone(command: string, args: string[]): Promise<CommandOutput> {
    try {
      return await this.deps.runCommand(this.opts.rcloneBin, [command, ...args], {
        timeout: this.opts.timeoutMs,
      })
    } catch (err) {
      throw AcquisitionError.uploadFailed(`rclone ${command} failed: ${commandFailure(err)}`, err)
    }
  }
}

function commandFailure(err: unknown): string {
  if (!(err instanceof Error)) return String(err)

  const stderr = "stderr" in err && typeof err.stderr === "string" ? err.stderr.trim() : ""

  return stderr || err.message
}
