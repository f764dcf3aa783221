import { describe, expect, it, vi } from "vitest";
import { parseConfig } from "../src/config/load";
import type { AiServiceName } from "../src/config/schema";
import { AiServiceAutomator } from "../src/upload/automator";
import type { ServiceUploader } from "../src/upload/types";
import { silentLogger } from "../src/utils/logger";

const now = () => new Date("2024-10-18T01:02:03.456Z");
const request = { prompt: "Analyse 005930", imagePaths: ["news.png"] };

function uploaders(
  overrides: Partial<Record<AiServiceName, ServiceUploader<string>>> = {}
): Record<AiServiceName, ServiceUploader<string>> {
  const ok =
    (service: AiServiceName): ServiceUploader<string> =>
    async (page, url) =>
      `${url}/c/${service}-${page}`;
  return { chatgpt: ok("chatgpt"), claude: ok("claude"), gemini: ok("gemini"), ...overrides };
}

describe("AI service automator", () => {
  it("uploads to enabled services in order and closes the page", async () => {
    const config = parseConfig({ ai_services: { claude: { url: "https://claude.ai", enabled: false } } });
    const close = vi.fn(async () => undefined);
    const wait = vi.fn(async () => undefined);
    const automator = new AiServiceAutomator<string>(config, silentLogger(), {
      openPage: async () => ({ page: "p1", close }),
      uploaders: uploaders(),
      wait,
      now
    });

    const results = await automator.upload(request);

    expect(results).toEqual([
      {
        service: "chatgpt",
        display_name: "ChatGPT",
        success: true,
        message: "uploaded",
        uploaded_at: "2024-10-18T01:02:03Z",
        response_url: "https://chat.openai.com/c/chatgpt-p1"
      },
      {
        service: "gemini",
        display_name: "Gemini",
        success: true,
        message: "uploaded",
        uploaded_at: "2024-10-18T01:02:03Z",
        response_url: "https://gemini.google.com/c/gemini-p1"
      }
    ]);
    expect(wait).toHaveBeenCalledTimes(1);
    expect(wait).toHaveBeenCalledWith(3000);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it("keeps going after one service fails", async () => {
    const close = vi.fn(async () => undefined);
    const automator = new AiServiceAutomator<string>(parseConfig({}), silentLogger(), {
      openPage: async () => ({ page: "p1", close }),
      uploaders: uploaders({
        claude: async () => {
          throw new Error("input box never appeared");
        }
      }),
      wait: async () => undefined,
      now
    });

    const results = await automator.upload(request);

    expect(results.map((result) => [result.service, result.success, result.message])).toEqual([
      ["chatgpt", true, "uploaded"],
      ["claude", false, "upload failed: input box never appeared"],
      ["gemini", true, "uploaded"]
    ]);
    expect(results[1].response_url).toBeNull();
    expect(close).toHaveBeenCalledTimes(1);
  });

  it("limits the run to the requested services", async () => {
    const chatgpt = vi.fn(async () => "https://chat.openai.com/c/1");
    const automator = new AiServiceAutomator<string>(parseConfig({}), silentLogger(), {
      openPage: async () => ({ page: "p1", close: async () => undefined }),
      uploaders: uploaders({ chatgpt }),
      wait: async () => undefined,
      now
    });

    const results = await automator.upload(request, ["gemini"]);

    expect(results.map((result) => result.service)).toEqual(["gemini"]);
    expect(chatgpt).not.toHaveBeenCalled();
  });

  it("fails every target when the browser does not open", async () => {
    const automator = new AiServiceAutomator<string>(parseConfig({}), silentLogger(), {
      openPage: async () => {
        throw new Error("no chromium");
      },
      uploaders: uploaders(),
      now
    });

    const results = await automator.upload(request, ["chatgpt", "claude"]);

    expect(results.map((result) => [result.service, result.success, result.message])).toEqual([
      ["chatgpt", false, "browser launch failed: no chromium"],
      ["claude", false, "browser launch failed: no chromium"]
    ]);
  });

  it("does nothing when every service is disabled", async () => {
    const openPage = vi.fn(async () => ({ page: "p1", close: async () => undefined }));
    const config = parseConfig({
      ai_services: {
        chatgpt: { url: "https://chat.openai.com", enabled: false },
        claude: { url: "https://claude.ai", enabled: false },
        gemini: { url: "https://gemini.google.com", enabled: false }
      }
    });
    const automator = new AiServiceAutomator<string>(config, silentLogger(), { openPage, uploaders: uploaders() });

    expect(automator.enabledServices()).toEqual([]);
    expect(await automator.upload(request)).toEqual([]);
    expect(openPage).not.toHaveBeenCalled();
  });
});
