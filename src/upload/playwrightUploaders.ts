import type { Page } from "playwright";
import type { AiServiceName, AppConfig } from "../config/schema";
import { closeLaunched, launchContext } from "../capture/playwright";
import { SERVICE_DISPLAY_NAMES } from "./types";
import type { PageHandle, ServiceUploader, UploadRequest } from "./types";
import { errorMessage } from "../errors";
import { pathExists } from "../utils/fs";
import type { Logger } from "../utils/logger";

type SendAction = { kind: "click"; selector: string } | { kind: "enter" };

interface ServiceProfile {
  input: string;
  fileInput: string;
  /** Services that only accept files through their own upload button and a file chooser. */
  uploadButton?: string;
  send: SendAction;
}

export const SERVICE_PROFILES: Record<AiServiceName, ServiceProfile> = {
  chatgpt: {
    input: "#prompt-textarea, textarea[data-id='root']",
    fileInput: "input[type='file']",
    send: { kind: "click", selector: "button[data-testid='send-button']" }
  },
  claude: {
    input: "div[contenteditable='true']",
    fileInput: "input[type='file']",
    send: { kind: "enter" }
  },
  gemini: {
    input: "rich-textarea div[contenteditable='true'], textarea",
    fileInput: "input[type='file']",
    uploadButton: "button[aria-label*='Upload']",
    send: { kind: "click", selector: "button[aria-label*='Send']" }
  }
};

/** Called when a service shows no input box, usually because the session is logged out. */
export type LoginPrompt = (displayName: string) => Promise<void>;

interface UploaderContext {
  config: AppConfig;
  logger: Logger;
  onLoginRequired: LoginPrompt;
}

async function attachImages(
  page: Page,
  profile: ServiceProfile,
  imagePaths: string[],
  ctx: UploaderContext
): Promise<void> {
  const timeout = ctx.config.webdriver.wait_timeout * 1000;
  for (const imagePath of imagePaths) {
    if (!(await pathExists(imagePath))) {
      ctx.logger.warn(`Image file not found, skipped: ${imagePath}`);
      continue;
    }
    if (profile.uploadButton) {
      const [chooser] = await Promise.all([
        page.waitForEvent("filechooser", { timeout }),
        page.locator(profile.uploadButton).first().click()
      ]);
      await chooser.setFiles(imagePath);
    } else {
      await page.locator(profile.fileInput).first().setInputFiles(imagePath);
    }
    ctx.logger.info(`Image attached: ${imagePath}`);
    await page.waitForTimeout(ctx.config.timing.upload_image_settle_ms);
  }
}

function uploaderFor(service: AiServiceName, ctx: UploaderContext): ServiceUploader<Page> {
  const profile = SERVICE_PROFILES[service];
  const displayName = SERVICE_DISPLAY_NAMES[service];

  return async (page: Page, serviceUrl: string, request: UploadRequest): Promise<string> => {
    const timeout = ctx.config.webdriver.wait_timeout * 1000;
    await page.goto(serviceUrl, { waitUntil: "domcontentloaded", timeout });
    await page.waitForTimeout(ctx.config.timing.upload_page_settle_ms);

    const input = page.locator(profile.input).first();
    try {
      await input.waitFor({ state: "visible", timeout });
    } catch (error) {
      ctx.logger.warn(`${displayName} input not visible (${errorMessage(error)}), waiting for login`);
      await ctx.onLoginRequired(displayName);
      await input.waitFor({ state: "visible", timeout });
    }

    if (request.imagePaths.length) {
      try {
        await attachImages(page, profile, request.imagePaths, ctx);
      } catch (error) {
        ctx.logger.warn(`${displayName} image upload failed, sending text only: ${errorMessage(error)}`);
      }
    }

    await input.click();
    await input.fill(request.prompt);

    if (profile.send.kind === "click") {
      await page.locator(profile.send.selector).first().click();
    } else {
      await input.press("Enter");
    }
    return page.url();
  };
}

export function playwrightUploaders(ctx: UploaderContext): Record<AiServiceName, ServiceUploader<Page>> {
  return {
    chatgpt: uploaderFor("chatgpt", ctx),
    claude: uploaderFor("claude", ctx),
    gemini: uploaderFor("gemini", ctx)
  };
}

export async function openUploadPage(config: AppConfig): Promise<PageHandle<Page>> {
  const launched = await launchContext(config.webdriver);
  try {
    const page = await launched.context.newPage();
    return { page, close: () => closeLaunched(launched) };
  } catch (error) {
    await closeLaunched(launched);
    throw error;
  }
}
