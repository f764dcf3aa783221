import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { collectImagePaths, composePrompt, stockSummary } from "../src/prompt/compose";
import type { StockRecord } from "../src/types/stockRecord";

function record(overrides: Partial<StockRecord> = {}): StockRecord {
  return {
    stock_code: "005930",
    stock_name: "Samsung Electronics",
    current_price: "71500",
    price_change: "1200",
    change_rate: "1.71",
    volume: "12,345,678",
    market_cap: "426조",
    company_description: null,
    news: [],
    investor_trends: [],
    related_themes: [],
    screenshots: {},
    financial_data: {},
    technical_indicators: {},
    collected_at: "2024-10-19T05:32:05Z",
    run_dir: "screenshots/005930_2410191432",
    steps: [],
    ...overrides
  };
}

describe("prompt composition", () => {
  it("summarises the record ahead of the template", () => {
    const prompt = composePrompt(
      record({
        news: [
          { index: 1, title: "Chip exports rise", date: "2024.10.18", source: "Daily A" },
          { index: 2, title: "Foundry orders up", date: "2024.10.17", source: "Wire B" },
          { index: 4, title: "Dividend announced", date: "2024.10.15", source: "Daily C" },
          { index: 5, title: "Fourth headline", date: "2024.10.14", source: "Daily D" }
        ],
        related_themes: ["A", "B", "C", "D", "E", "F"]
      }),
      "Analyse this stock."
    );

    expect(prompt).toBe(
      [
        "[Stock summary]",
        "- Name: Samsung Electronics (005930)",
        "- Price: 71500",
        "- Change: 1200 (1.71)",
        "- Volume: 12,345,678",
        "- Market cap: 426조",
        "",
        "[Recent news (top 3)]",
        "1. Chip exports rise (2024.10.18, Daily A)",
        "2. Foundry orders up (2024.10.17, Wire B)",
        "3. Dividend announced (2024.10.15, Daily C)",
        "",
        "[Related themes] A, B, C, D, E",
        "",
        "Analyse this stock."
      ].join("\n")
    );
  });

  it("prints missing values as n/a and omits empty sections", () => {
    expect(stockSummary(record({ stock_name: null, volume: null, change_rate: null }))).toBe(
      [
        "[Stock summary]",
        "- Name: n/a (005930)",
        "- Price: 71500",
        "- Change: 1200 (n/a)",
        "- Volume: n/a",
        "- Market cap: 426조"
      ].join("\n")
    );
  });

  describe("image paths", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(os.tmpdir(), "compose-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("keeps existing files in record order", async () => {
      const news = path.join(dir, "news.png");
      const chart = path.join(dir, "chart.png");
      await writeFile(news, "n");
      await writeFile(chart, "c");

      const paths = await collectImagePaths(
        record({ screenshots: { news, company_analysis: path.join(dir, "gone.png"), chart_day: chart } })
      );

      expect(paths).toEqual([news, chart]);
    });
  });
});
