import type { Page } from "playwright";
import { AI_SERVICES } from "../config/schema";
import type { AiServiceName, AppConfig } from "../config/schema";
import { openUploadPage, playwrightUploaders } from "./playwrightUploaders";
import type { LoginPrompt } from "./playwrightUploaders";
import { SERVICE_DISPLAY_NAMES } from "./types";
import type { PageHandle, ServiceUploader, UploadRequest, UploadResult } from "./types";
import { errorMessage } from "../errors";
import type { Logger } from "../utils/logger";
import { nowUtcIsoSeconds, sleep } from "../utils/time";

export interface AutomatorDeps<P> {
  openPage: () => Promise<PageHandle<P>>;
  uploaders: Record<AiServiceName, ServiceUploader<P>>;
  wait?: (ms: number) => Promise<void>;
  now?: () => Date;
}

/**
 * Posts the same prompt and images to each enabled chat front-end in turn, in
 * one browser. A failing service is recorded and the next one still runs.
 */
export class AiServiceAutomator<P> {
  private readonly wait: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(
    private readonly config: AppConfig,
    private readonly logger: Logger,
    private readonly deps: AutomatorDeps<P>
  ) {
    this.wait = deps.wait ?? sleep;
    this.now = deps.now ?? (() => new Date());
  }

  enabledServices(): AiServiceName[] {
    return AI_SERVICES.filter((service) => this.config.ai_services[service].enabled);
  }

  private result(service: AiServiceName, success: boolean, message: string, responseUrl: string | null): UploadResult {
    return {
      service,
      display_name: SERVICE_DISPLAY_NAMES[service],
      success,
      message,
      uploaded_at: nowUtcIsoSeconds(this.now()),
      response_url: responseUrl
    };
  }

  async upload(request: UploadRequest, services?: readonly AiServiceName[]): Promise<UploadResult[]> {
    const targets = (services ?? AI_SERVICES).filter((service) => {
      if (this.config.ai_services[service].enabled) return true;
      this.logger.info(`Skipping disabled service: ${service}`);
      return false;
    });
    if (!targets.length) {
      this.logger.warn("No enabled AI services to upload to");
      return [];
    }

    let handle: PageHandle<P>;
    try {
      handle = await this.deps.openPage();
    } catch (error) {
      const message = `browser launch failed: ${errorMessage(error)}`;
      this.logger.error(message);
      return targets.map((service) => this.result(service, false, message, null));
    }

    const results: UploadResult[] = [];
    try {
      for (const [index, service] of targets.entries()) {
        const displayName = SERVICE_DISPLAY_NAMES[service];
        this.logger.info(`Uploading to ${displayName}`);
        try {
          const responseUrl = await this.deps.uploaders[service](
            handle.page,
            this.config.ai_services[service].url,
            request
          );
          results.push(this.result(service, true, "uploaded", responseUrl));
          this.logger.info(`${displayName} upload complete`);
        } catch (error) {
          results.push(this.result(service, false, `upload failed: ${errorMessage(error)}`, null));
          this.logger.error(`${displayName} upload failed`, error);
        }
        if (index < targets.length - 1) {
          await this.wait(this.config.timing.service_switch_delay_ms);
        }
      }
    } finally {
      await handle.close().catch((error: unknown) => {
        this.logger.warn(`Closing upload browser failed: ${errorMessage(error)}`);
      });
    }

    const succeeded = results.filter((result) => result.success).length;
    this.logger.info(`AI uploads: ${succeeded}/${results.length} succeeded`);
    return results;
  }
}

export function createPlaywrightAutomator(
  config: AppConfig,
  logger: Logger,
  onLoginRequired: LoginPrompt
): AiServiceAutomator<Page> {
  return new AiServiceAutomator<Page>(config, logger, {
    openPage: () => openUploadPage(config),
    uploaders: playwrightUploaders({ config, logger, onLoginRequired })
  });
}
