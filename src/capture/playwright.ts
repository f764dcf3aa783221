import { chromium } from "playwright";
import type { Browser, BrowserContext } from "playwright";
import { parseWindowSize } from "../config/schema";
import type { AppConfig } from "../config/schema";

export type WebDriverConfig = AppConfig["webdriver"];

export const DEFAULT_LOCALE = "ko-KR";
export const DEFAULT_ACCEPT_LANGUAGE = "ko-KR,ko;q=0.9,en-US;q=0.8,en;q=0.7";

const LAUNCH_ARGS = ["--disable-blink-features=AutomationControlled", "--no-sandbox", "--disable-dev-shm-usage"];

export interface LaunchedContext {
  context: BrowserContext;
  /** Null for persistent contexts, which own their browser. */
  browser: Browser | null;
}

async function hideAutomationFlag(context: BrowserContext): Promise<void> {
  await context.addInitScript(() => {
    Object.defineProperty(navigator, "webdriver", { get: () => undefined });
  });
}

export async function launchChromium(options: WebDriverConfig): Promise<Browser> {
  return chromium.launch({
    headless: options.chrome.headless,
    args: LAUNCH_ARGS
  });
}

export async function newContext(browser: Browser, options: WebDriverConfig): Promise<BrowserContext> {
  return browser.newContext({
    viewport: parseWindowSize(options.chrome.window_size),
    userAgent: options.chrome.user_agent,
    locale: DEFAULT_LOCALE,
    extraHTTPHeaders: {
      "Accept-Language": DEFAULT_ACCEPT_LANGUAGE
    }
  });
}

/**
 * Launch Chromium and open a context with the configured viewport and user
 * agent. With `user_data_dir` set, a persistent profile keeps site settings
 * (chart indicators, logins) between runs.
 */
export async function launchContext(options: WebDriverConfig): Promise<LaunchedContext> {
  const userDataDir = options.chrome.user_data_dir;
  if (userDataDir) {
    const context = await chromium.launchPersistentContext(userDataDir, {
      headless: options.chrome.headless,
      args: LAUNCH_ARGS,
      viewport: parseWindowSize(options.chrome.window_size),
      userAgent: options.chrome.user_agent,
      locale: DEFAULT_LOCALE,
      extraHTTPHeaders: {
        "Accept-Language": DEFAULT_ACCEPT_LANGUAGE
      }
    });
    await hideAutomationFlag(context);
    return { context, browser: null };
  }

  const browser = await launchChromium(options);
  try {
    const context = await newContext(browser, options);
    await hideAutomationFlag(context);
    return { context, browser };
  } catch (error) {
    await browser.close();
    throw error;
  }
}

export async function closeLaunched(launched: LaunchedContext): Promise<void> {
  await launched.context.close();
  if (launched.browser) {
    await launched.browser.close();
  }
}
