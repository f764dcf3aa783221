import type { BrowserSession, ImageOptions } from "../browser/session";
import { writeBinary } from "../utils/fs";
import { errorMessage } from "../errors";
import type { Logger } from "../utils/logger";

export type CaptureStrategy = "cdp_full_page" | "element" | "viewport";

export type CaptureOutcome =
  | { status: "success" | "degraded"; strategy: CaptureStrategy; path: string; issues: string[] }
  | { status: "failed"; issues: string[] };

/**
 * Screenshot strategies with fallbacks. Nothing here throws: every failure
 * moves on to the next strategy and ends, at worst, in a `failed` outcome.
 * Files are overwritten, never appended to.
 */
export class ScreenshotCapturer {
  constructor(
    private readonly session: BrowserSession,
    private readonly image: ImageOptions,
    private readonly logger: Logger
  ) {}

  async captureFullPage(filePath: string): Promise<CaptureOutcome> {
    const issues: string[] = [];

    try {
      const data = await this.session.captureDocument(this.image);
      if (data.length > 0) {
        await writeBinary(filePath, data);
        this.logger.info(`Full-page capture saved: ${filePath}`);
        return { status: "success", strategy: "cdp_full_page", path: filePath, issues };
      }
      issues.push("cdp_full_page: no image data");
    } catch (error) {
      issues.push(`cdp_full_page: ${errorMessage(error)}`);
    }
    this.logger.warn(`Full-page capture failed, falling back to viewport: ${issues.join("; ")}`);

    try {
      const data = await this.session.captureViewport(this.image);
      if (data.length > 0) {
        await writeBinary(filePath, data);
        this.logger.info(`Viewport capture saved: ${filePath}`);
        return { status: "degraded", strategy: "viewport", path: filePath, issues };
      }
      issues.push("viewport: no image data");
    } catch (error) {
      issues.push(`viewport: ${errorMessage(error)}`);
    }

    this.logger.error(`Capture failed: ${filePath}`, issues);
    return { status: "failed", issues };
  }

  /** First candidate that resolves to an element wins; otherwise the full page. */
  async captureElement(selectors: readonly string[], filePath: string): Promise<CaptureOutcome> {
    const issues: string[] = [];

    for (const selector of selectors) {
      try {
        const data = await this.session.captureElement(selector, this.image);
        if (!data) {
          issues.push(`element ${selector}: not found`);
          continue;
        }
        if (data.length === 0) {
          issues.push(`element ${selector}: no image data`);
          continue;
        }
        await writeBinary(filePath, data);
        this.logger.info(`Element capture saved (${selector}): ${filePath}`);
        return { status: "success", strategy: "element", path: filePath, issues };
      } catch (error) {
        issues.push(`element ${selector}: ${errorMessage(error)}`);
      }
    }

    this.logger.warn(`No element capture for ${selectors.join(" | ")}, capturing full page`);
    const fallback = await this.captureFullPage(filePath);
    if (fallback.status === "failed") {
      return { status: "failed", issues: [...issues, ...fallback.issues] };
    }
    return { ...fallback, status: "degraded", issues: [...issues, ...fallback.issues] };
  }
}
