import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { readFileSync } from "fs";
import { mkdtemp, rm } from "fs/promises";
import os from "os";
import path from "path";
import { StockCollector } from "../src/collect/collector";
import { parseConfig } from "../src/config/load";
import type { AppConfig } from "../src/config/schema";
import { CHART_INDICATOR_SELECTORS, CHART_INTERVALS } from "../src/dom/selectors";
import { BrowserLaunchError } from "../src/errors";
import { pathExists } from "../src/utils/fs";
import { silentLogger } from "../src/utils/logger";
import { FakeSession } from "./fakeSession";

const fixturesDir = path.join(process.cwd(), "fixtures");
const readFixture = (name: string) => readFileSync(path.join(fixturesDir, name), "utf8");

const CODE = "005930";
const BASE = "https://finance.naver.com";
const OVERVIEW_URL = `${BASE}/item/main.naver?code=${CODE}`;
const ANALYSIS_URL = `${BASE}/item/coinfo.naver?code=${CODE}`;
const NEWS_URL = `${BASE}/item/news.naver?code=${CODE}`;
const TRENDS_URL = `${BASE}/item/frgn.naver?code=${CODE}`;
const CHART_URL = `${BASE}/item/fchart.naver?code=${CODE}`;

const startedAt = new Date(2024, 9, 19, 14, 32, 5);

function workingSession(): FakeSession {
  const session = new FakeSession();
  session.pages = {
    [OVERVIEW_URL]: { html: readFixture("naver_overview.html") },
    [ANALYSIS_URL]: { html: "<html><body><iframe></iframe></body></html>" },
    [NEWS_URL]: { html: readFixture("naver_news.html") },
    [TRENDS_URL]: { html: readFixture("naver_investor_trends.html") },
    [CHART_URL]: { html: "<html><body><cq-context></cq-context></body></html>" }
  };
  session.frameHeight = 2400;
  session.elements["cq-context"] = Buffer.from("chart");
  session.clickable = new Set([
    CHART_INDICATOR_SELECTORS.menu,
    ...CHART_INDICATOR_SELECTORS.studies.map((study) => study.selector),
    ...CHART_INTERVALS.map((interval) => interval.selector)
  ]);
  return session;
}

describe("stock collector", () => {
  let dir: string;
  let config: AppConfig;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "collector-"));
    config = parseConfig({
      screenshot: { save_path: path.join(dir, "screenshots") },
      data: { save_path: path.join(dir, "data") },
      logging: { file_path: null }
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const collectorFor = (session: FakeSession) =>
    new StockCollector(config, silentLogger(), { createSession: () => session, now: () => startedAt });

  it("collects every stage into one record", async () => {
    const session = workingSession();
    const record = await collectorFor(session).collect(CODE);

    expect(record).not.toBeNull();
    if (!record) return;
    const runDir = path.join(dir, "screenshots", "005930_2410191432");
    expect(record.stock_code).toBe(CODE);
    expect(record.stock_name).toBe("Samsung Electronics");
    expect(record.current_price).toBe("71500");
    expect(record.related_themes).toEqual(["Semiconductors", "Smartphones"]);
    expect(record.news.map((item) => item.title)).toEqual([
      "Chip exports rise",
      "Foundry orders up",
      "Dividend announced"
    ]);
    expect(record.investor_trends).toHaveLength(2);
    expect(record.run_dir).toBe(runDir);
    expect(record.collected_at).toBe(startedAt.toISOString().replace(/\.\d{3}Z$/, "Z"));

    expect(Object.keys(record.screenshots)).toEqual([
      "company_analysis",
      "news",
      "investor_trends",
      "chart_month",
      "chart_week",
      "chart_day",
      "chart_1hour"
    ]);
    expect(record.screenshots.news).toBe(path.join(runDir, "005930_news_20241019_143205.png"));
    for (const filePath of Object.values(record.screenshots)) {
      expect(await pathExists(filePath)).toBe(true);
    }

    expect(record.steps).toEqual([
      { stage: "overview", status: "success", detail: null },
      { stage: "basic_info", status: "success", detail: null },
      { stage: "themes", status: "success", detail: null },
      { stage: "company_analysis", status: "success", detail: null },
      { stage: "news", status: "degraded", detail: "news #3: missing source" },
      { stage: "investor_trends", status: "success", detail: null },
      { stage: "chart_indicators", status: "success", detail: null },
      { stage: "advanced_charts", status: "success", detail: null }
    ]);
    expect(session.navigations).toEqual([OVERVIEW_URL, ANALYSIS_URL, NEWS_URL, TRENDS_URL, CHART_URL]);
    expect(session.closeCount).toBe(1);
  });

  it("stops after a failed overview and still closes the session", async () => {
    const session = workingSession();
    session.pages[OVERVIEW_URL] = { html: "", loads: false };

    const record = await collectorFor(session).collect(CODE);

    expect(record).toBeNull();
    expect(session.navigations).toEqual([OVERVIEW_URL]);
    expect(session.closeCount).toBe(1);
  });

  it("captures the host page when the analysis frame is missing and carries on", async () => {
    const session = workingSession();
    session.frameHeight = null;

    const record = await collectorFor(session).collect(CODE);

    expect(record).not.toBeNull();
    if (!record) return;
    expect(record.steps.find((step) => step.stage === "company_analysis")).toEqual({
      stage: "company_analysis",
      status: "degraded",
      detail: "frame: not found, capturing host page"
    });
    expect(record.screenshots.company_analysis).toBeDefined();
    expect(record.screenshots.chart_day).toBeDefined();
    expect(record.news).toHaveLength(3);
  });

  it("captures the host page when resizing the analysis frame throws", async () => {
    const session = workingSession();
    session.frameHeight = 1200;
    session.resizeError = new Error("Execution context was destroyed");

    const record = await collectorFor(session).collect(CODE);

    expect(record).not.toBeNull();
    if (!record) return;
    expect(record.steps.find((step) => step.stage === "company_analysis")).toEqual({
      stage: "company_analysis",
      status: "degraded",
      detail: "frame: Execution context was destroyed, capturing host page"
    });
    expect(record.screenshots.company_analysis).toBe(
      path.join(dir, "screenshots", "005930_2410191432", "005930_company_analysis_20241019_143205.png")
    );
  });

  it("skips an interval whose control is missing", async () => {
    const session = workingSession();
    session.clickable.delete("div.week:not(.selected)");

    const record = await collectorFor(session).collect(CODE);

    expect(record).not.toBeNull();
    if (!record) return;
    expect(record.screenshots.chart_week).toBeUndefined();
    expect(record.screenshots.chart_1hour).toBeDefined();
    expect(record.steps.find((step) => step.stage === "advanced_charts")).toEqual({
      stage: "advanced_charts",
      status: "degraded",
      detail: "chart_week: interval control not found (div.week:not(.selected))"
    });
  });

  it("waits the longer settle time for intraday charts", async () => {
    config = parseConfig({
      screenshot: { save_path: path.join(dir, "screenshots") },
      logging: { file_path: null },
      timing: { chart_interval_settle_ms: 11, intraday_extra_settle_ms: 7 }
    });
    const session = workingSession();

    await collectorFor(session).collect(CODE);

    expect(session.waits.filter((ms) => ms === 11)).toHaveLength(4);
    expect(session.waits.filter((ms) => ms === 7)).toHaveLength(1);
  });

  it("fails both chart stages when the chart page does not load", async () => {
    const session = workingSession();
    session.pages[CHART_URL] = { html: "", loads: false };

    const record = await collectorFor(session).collect(CODE);

    expect(record).not.toBeNull();
    if (!record) return;
    expect(record.steps.slice(-2)).toEqual([
      { stage: "chart_indicators", status: "failed", detail: "advanced chart page did not load" },
      { stage: "advanced_charts", status: "failed", detail: "advanced chart page did not load" }
    ]);
    expect(Object.keys(record.screenshots)).toEqual(["company_analysis", "news", "investor_trends"]);
  });

  it("propagates a browser launch failure", async () => {
    const session = workingSession();
    session.openError = new BrowserLaunchError("no chromium");

    await expect(collectorFor(session).collect(CODE)).rejects.toBeInstanceOf(BrowserLaunchError);
    expect(session.navigations).toEqual([]);
  });
});
