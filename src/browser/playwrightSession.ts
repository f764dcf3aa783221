import type { Page } from "playwright";
import type { BrowserSession, ImageOptions } from "./session";
import { dispatchPointerPair, documentContentHeight, expandFrame } from "./pointer";
import { closeLaunched, launchContext } from "../capture/playwright";
import type { LaunchedContext } from "../capture/playwright";
import type { AppConfig } from "../config/schema";
import { BrowserLaunchError, errorMessage } from "../errors";
import type { Logger } from "../utils/logger";

function imageQuality(image: ImageOptions): number | undefined {
  return image.format === "jpeg" ? image.quality : undefined;
}

export class PlaywrightBrowserSession implements BrowserSession {
  private launched: LaunchedContext | null = null;
  private page: Page | null = null;

  constructor(
    private readonly config: AppConfig,
    private readonly logger: Logger
  ) {}

  private get waitTimeoutMs(): number {
    return this.config.webdriver.wait_timeout * 1000;
  }

  private get actionTimeoutMs(): number {
    return this.config.webdriver.implicit_wait * 1000;
  }

  private requirePage(): Page {
    if (!this.page) {
      throw new Error("Browser session is not open");
    }
    return this.page;
  }

  async open(): Promise<void> {
    if (this.page) return;
    try {
      this.launched = await launchContext(this.config.webdriver);
      const existing = this.launched.context.pages();
      this.page = existing.length ? existing[0] : await this.launched.context.newPage();
      this.page.setDefaultTimeout(this.actionTimeoutMs);
      this.logger.info("Chromium session opened", {
        window_size: this.config.webdriver.chrome.window_size,
        headless: this.config.webdriver.chrome.headless,
        profile: this.config.webdriver.chrome.user_data_dir
      });
    } catch (error) {
      await this.close();
      throw new BrowserLaunchError(`Could not launch Chromium: ${errorMessage(error)}`, { cause: error });
    }
  }

  async navigate(url: string, readySelectors: readonly string[] = ["body"]): Promise<boolean> {
    const page = this.requirePage();
    this.logger.info(`Navigating to ${url}`);

    try {
      try {
        await page.goto(url, { waitUntil: "load", timeout: this.waitTimeoutMs });
      } catch (error) {
        if (error instanceof Error && /Timeout/i.test(error.message)) {
          await page.goto(url, { waitUntil: "domcontentloaded", timeout: this.waitTimeoutMs });
        } else {
          throw error;
        }
      }
    } catch (error) {
      this.logger.error(`Navigation failed: ${url}`, error);
      return false;
    }

    let loaded = false;
    for (const selector of readySelectors) {
      try {
        await page.waitForSelector(selector, { state: "attached", timeout: this.waitTimeoutMs });
        this.logger.debug(`Page ready on ${selector}`);
        loaded = true;
        break;
      } catch (error) {
        this.logger.debug(`Ready selector ${selector} did not appear: ${errorMessage(error)}`);
      }
    }

    if (!loaded) {
      this.logger.warn(`No ready selector appeared on ${url}`, readySelectors);
      return false;
    }

    await this.wait(this.config.naver_finance.delay_between_requests * 1000);
    return true;
  }

  async content(): Promise<string> {
    return this.requirePage().content();
  }

  async scrollToTop(): Promise<void> {
    await this.requirePage().evaluate(() => window.scrollTo(0, 0));
  }

  async wait(ms: number): Promise<void> {
    if (ms <= 0) return;
    await this.requirePage().waitForTimeout(ms);
  }

  async captureDocument(image: ImageOptions): Promise<Buffer> {
    const page = this.requirePage();
    const cdp = await page.context().newCDPSession(page);
    try {
      const metrics = await cdp.send("Page.getLayoutMetrics");
      const size = metrics.cssContentSize ?? metrics.contentSize;
      const result = await cdp.send("Page.captureScreenshot", {
        format: image.format,
        quality: imageQuality(image),
        captureBeyondViewport: true,
        fromSurface: true,
        clip: { x: 0, y: 0, width: size.width, height: size.height, scale: 1 }
      });
      return Buffer.from(result.data, "base64");
    } finally {
      await cdp.detach().catch((error: unknown) => {
        this.logger.debug(`CDP detach failed: ${errorMessage(error)}`);
      });
    }
  }

  async captureViewport(image: ImageOptions): Promise<Buffer> {
    return this.requirePage().screenshot({
      type: image.format,
      quality: imageQuality(image),
      timeout: this.waitTimeoutMs
    });
  }

  async captureElement(selector: string, image: ImageOptions): Promise<Buffer | null> {
    const locator = this.requirePage().locator(selector).first();
    if ((await locator.count()) === 0) return null;
    return locator.screenshot({
      type: image.format,
      quality: imageQuality(image),
      timeout: this.waitTimeoutMs
    });
  }

  async measureFrameHeight(frameXPath: string): Promise<number | null> {
    const handle = await this.requirePage().$(`xpath=${frameXPath}`);
    if (!handle) return null;
    try {
      const frame = await handle.contentFrame();
      if (!frame) return null;
      return await frame.evaluate(documentContentHeight);
    } finally {
      await handle.dispose();
    }
  }

  async resizeFrame(frameXPath: string, height: number): Promise<boolean> {
    return this.requirePage().evaluate(expandFrame, { xpath: frameXPath, height });
  }

  async dispatchPointerClick(selector: string): Promise<boolean> {
    return this.requirePage().evaluate(dispatchPointerPair, selector);
  }

  async close(): Promise<void> {
    const launched = this.launched;
    this.launched = null;
    this.page = null;
    if (!launched) return;
    try {
      await closeLaunched(launched);
      this.logger.info("Chromium session closed");
    } catch (error) {
      this.logger.error("Closing Chromium failed", error);
    }
  }
}
