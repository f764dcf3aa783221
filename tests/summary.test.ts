import { describe, expect, it } from "vitest";
import { formatUploadSummary } from "../src/upload/summary";

describe("upload summary", () => {
  it("handles no results", () => {
    expect(formatUploadSummary([])).toBe("No upload results.");
  });

  it("lists successes and failures", () => {
    const summary = formatUploadSummary([
      {
        service: "chatgpt",
        display_name: "ChatGPT",
        success: true,
        message: "uploaded",
        uploaded_at: "2024-10-18T01:02:03Z",
        response_url: "https://chat.openai.com/c/1"
      },
      {
        service: "claude",
        display_name: "Claude",
        success: false,
        message: "upload failed: timeout",
        uploaded_at: "2024-10-18T01:02:06Z",
        response_url: null
      },
      {
        service: "gemini",
        display_name: "Gemini",
        success: true,
        message: "uploaded",
        uploaded_at: "2024-10-18T01:02:09Z",
        response_url: null
      }
    ]);

    expect(summary).toBe(
      [
        "Upload summary: 3 service(s), 2 succeeded, 1 failed",
        "Succeeded:",
        "  - ChatGPT: uploaded https://chat.openai.com/c/1",
        "  - Gemini: uploaded",
        "Failed:",
        "  - Claude: upload failed: timeout"
      ].join("\n")
    );
  });
});
