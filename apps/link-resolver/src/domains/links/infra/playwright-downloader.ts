import { mkdir, writeFile } from "node:fs/promises"
import path from "node:path"
import type { Clock, Milliseconds } from "@durable-links/clock"
import { errorMessage } from "@durable-links/errors"
import type { Logger } from "@durable-links/logger"
import {
  type APIRequestContext,
  chromium,
  type Download,
  errors,
  type Locator,
  type Page,
} from "playwright-core"
import { targetUrlFor } from "../keyspace"
import type { ArtifactDownloader, DownloadedArtifact } from "../model/acquisition.model"
import { AcquisitionError } from "../model/link.errors"
import type { ItemId } from "../model/link.model"

/** The slice of a Playwright page the downloader drives. */
export type AutomationPage = Pick<Page, "goto" | "locator" | "getByText" | "url"> & {
  waitForEvent(event: "download", options: { timeout: number }): Promise<Download>
  context(): { request: Pick<APIRequestContext, "get"> }
}

export type AutomationBrowser = {
  newPage(): Promise<AutomationPage>
  close(): Promise<void>
}

export type LaunchBrowserFn = () => Promise<AutomationBrowser>

export type PlaywrightDownloaderOptions = {
  /** Contains `{id}`, replaced by the URL-encoded item id. */
  targetUrlTemplate: string
  downloadsDir: string
  navigationTimeoutMs: Milliseconds
  /** Wait after load before looking for the control. */
  settleMs: Milliseconds
  downloadTimeoutMs: Milliseconds
  controlLabel: string
}

export type PlaywrightDownloaderDeps = {
  launchBrowser: LaunchBrowserFn
  clock: Clock
  logger: Logger
}

export type ChromiumLaunchOptions = {
  executablePath?: string
}

const CHROMIUM_ARGS = ["--no-sandbox", "--disable-dev-shm-usage", "--disable-setuid-sandbox"]

/** Headless Chromium with downloads enabled, one context per launch. */
export function chromiumLauncher(opts: ChromiumLaunchOptions = {}): LaunchBrowserFn {
  return async () => {
    const browser = await chromium.launch({
      headless: true,
      args: CHROMIUM_ARGS,
      ...(opts.executablePath !== undefined && { executablePath: opts.executablePath }),
    })

    const context = await browser.newContext({ acceptDownloads: true })

    return {
      newPage: () => context.newPage(),
      close: () => browser.close(),
    }
  }
}

/**
 * Opens the item page, clicks the download control and saves what the browser
 * downloads. When the click yields no download in time, fetches the control's
 * `href` with the page's cookies instead.
 */
export class PlaywrightDownloader implements ArtifactDownloader {
  public constructor(
    private readonly deps: PlaywrightDownloaderDeps,
    private readonly opts: PlaywrightDownloaderOptions,
  ) {}

  async download(itemId: ItemId): Promise<DownloadedArtifact> {
    const targetUrl = targetUrlFor(this.opts.targetUrlTemplate, itemId)
    const browser = await this.launch()

    try {
      const page = await browser.newPage()

      await page.goto(targetUrl, { waitUntil: "load", timeout: this.opts.navigationTimeoutMs })
      await this.deps.clock.sleep(this.opts.settleMs)

      const control = await this.findControl(page)

      if (!control) {
        throw AcquisitionError.notFound(
          `No "${this.opts.controlLabel}" control found on ${targetUrl}`,
          { targetUrl },
        )
      }

      await mkdir(this.opts.downloadsDir, { recursive: true })

      const download = await this.clickForDownload(page, control)

      return download
        ? await this.saveDownload(download, itemId)
        : await this.fetchHref(page, control, itemId)
    } catch (err) {
      throw toAcquisitionError(err)
    } finally {
      await this.close(browser)
    }
  }

  private async launch(): Promise<AutomationBrowser> {
    try {
      return await this.deps.launchBrowser()
    } catch (err) {
      throw AcquisitionError.unknown(`Browser launch failed: ${errorMessage(err)}`, err)
    }
  }

  /** First candidate with at least one match wins. */
  private async findControl(page: AutomationPage): Promise<Locator | undefined> {
    const label = this.opts.controlLabel
    const literal = xpathLiteral(label)

    const candidates = [
      page.locator("button", { hasText: label }),
      page.locator("a", { hasText: label }),
      page.locator(`xpath=//button[normalize-space(.)=${literal}]`),
      page.locator(`xpath=//a[normalize-space(.)=${literal}]`),
      page.getByText(label, { exact: true }),
    ]

    for (const candidate of candidates) {
      if ((await this.countMatches(candidate)) > 0) return candidate.first()
    }

    return undefined
  }

  private async countMatches(locator: Locator): Promise<number> {
    try {
      return await locator.count()
    } catch (err) {
      this.deps.logger.debug("Download control candidate failed", { err })

      return 0
    }
  }

  /** Resolves to null when no download starts before the timeout. */
  private async clickForDownload(
    page: AutomationPage,
    control: Locator,
  ): Promise<Download | null> {
    const timeout = this.opts.downloadTimeoutMs

    try {
      const [download] = await Promise.all([
        page.waitForEvent("download", { timeout }),
        control.click({ timeout }),
      ])

      return download
    } catch (err) {
      if (err instanceof errors.TimeoutError) return null

      throw err
    }
  }

  private async saveDownload(download: Download, itemId: ItemId): Promise<DownloadedArtifact> {
    const suggested = download.suggestedFilename()
    const filename = this.localName(itemId, suggested)
    const target = path.resolve(this.opts.downloadsDir, filename)

    await download.saveAs(target)

    return { path: target, filename }
  }

  private async fetchHref(
    page: AutomationPage,
    control: Locator,
    itemId: ItemId,
  ): Promise<DownloadedArtifact> {
    const href = await control.getAttribute("href")

    if (!href) {
      throw AcquisitionError.automationTimeout(
        "Click did not start a download and the control has no href",
      )
    }

    const url = new URL(href, page.url()).toString()

    this.deps.logger.debug("Falling back to direct fetch of download href", { url })

    const response = await page
      .context()
      .request.get(url, { timeout: this.opts.downloadTimeoutMs })

    if (!response.ok()) {
      throw AcquisitionError.unknown(`Fallback fetch of ${url} failed with ${response.status()}`)
    }

    const filename = this.localName(
      itemId,
      filenameFromDisposition(response.headers()["content-disposition"]),
    )
    const target = path.resolve(this.opts.downloadsDir, filename)

    await writeFile(target, await response.body())

    return { path: target, filename }
  }

  private localName(itemId: ItemId, suggested: string | undefined): string {
    const base = `${safeFilename(itemId)}-${this.deps.clock.nowMs()}`

    return suggested ? `${base}-${safeFilename(suggested)}` : base
  }

  private async close(browser: AutomationBrowser): Promise<void> {
    try {
      await browser.close()
    } catch (err) {
      this.deps.logger.warn("Failed to close browser", { err })
    }
  }
}

function toAcquisitionError(err: unknown): AcquisitionError {
  if (err instanceof AcquisitionError) return err

  if (err instanceof errors.TimeoutError) {
    return AcquisitionError.automationTimeout(err.message, err)
  }

  return AcquisitionError.unknown(errorMessage(err), err)
}

export function safeFilename(name: string): string {
  return name.replace(/[^A-Za-z0-9._-]/g, "_")
}

export function filenameFromDisposition(header: string | undefined): string | undefined {
  const match = header?.match(/filename="?([^";]+)"?/i)

  return match?.[1]?.trim() || undefined
}

/** Quotes a string for use inside an XPath expression. */
export function xpathLiteral(value: string): string {
  if (!value.includes('"')) return `"${value}"`
  if (!value.includes("'")) return `'${value}'`

  const parts = value.split('"').map((part) => `"${part}"`)

  return `concat(${parts.join(`, '"', `)})`
}
