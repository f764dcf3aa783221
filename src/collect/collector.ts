import type { BrowserSession } from "../browser/session";
import { PlaywrightBrowserSession } from "../browser/playwrightSession";
import { ScreenshotCapturer } from "../capture/screenshot";
import type { CaptureOutcome } from "../capture/screenshot";
import type { AppConfig } from "../config/schema";
import { stockPageUrl } from "../config/urls";
import { extractBasicInfo } from "../dom/basicInfo";
import { extractInvestorTrends, extractNews, extractThemes, INVESTOR_TREND_LIMIT, NEWS_LIMIT } from "../dom/lists";
import {
  CHART_AREA_SELECTORS,
  CHART_INDICATOR_SELECTORS,
  CHART_INTERVALS,
  COMPANY_ANALYSIS_FRAME_XPATH,
  OVERVIEW_READY_SELECTORS
} from "../dom/selectors";
import { artifactPath, runDir } from "../io/paths";
import type { StepResult } from "../types/result";
import type { CollectionStage, StockRecord } from "../types/stockRecord";
import { errorMessage } from "../errors";
import { ensureDir } from "../utils/fs";
import type { Logger } from "../utils/logger";
import { nowUtcIsoSeconds } from "../utils/time";

export interface CollectorDeps {
  createSession?: () => BrowserSession;
  now?: () => Date;
}

interface StageReport {
  status: "success" | "degraded" | "failed";
  issues: string[];
}

interface RunContext {
  stockCode: string;
  session: BrowserSession;
  capturer: ScreenshotCapturer;
  runDir: string;
  record: StockRecord;
  chartPageLoaded: boolean;
}

function report(issues: string[], failed = false): StageReport {
  if (failed) return { status: "failed", issues };
  return { status: issues.length ? "degraded" : "success", issues };
}

/** Unwrap an extraction result, moving its issues into `issues`. */
function absorb<T>(result: StepResult<T>, fallback: T, issues: string[]): T {
  if (result.status === "failed") {
    issues.push(result.error);
    return fallback;
  }
  if (result.status === "degraded") {
    issues.push(...result.issues);
  }
  return result.value;
}

function emptyRecord(stockCode: string, startedAt: Date, runDirPath: string): StockRecord {
  return {
    stock_code: stockCode,
    stock_name: null,
    current_price: null,
    price_change: null,
    change_rate: null,
    volume: null,
    market_cap: null,
    company_description: null,
    news: [],
    investor_trends: [],
    related_themes: [],
    screenshots: {},
    financial_data: {},
    technical_indicators: {},
    collected_at: nowUtcIsoSeconds(startedAt),
    run_dir: runDirPath,
    steps: []
  };
}

/**
 * Walks one stock's Naver Finance pages in a fixed order with a single browser
 * session. Only a failed overview load ends the run early; every later stage
 * runs whatever happened before it.
 */
export class StockCollector {
  private readonly createSession: () => BrowserSession;
  private readonly now: () => Date;

  constructor(
    private readonly config: AppConfig,
    private readonly logger: Logger,
    deps: CollectorDeps = {}
  ) {
    this.createSession =
      deps.createSession ?? (() => new PlaywrightBrowserSession(config, logger.child("browser")));
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Collect everything for `stockCode`. Resolves null when the overview page
   * does not load; rejects with `BrowserLaunchError` when no browser starts.
   */
  async collect(stockCode: string): Promise<StockRecord | null> {
    const startedAt = this.now();
    const runDirPath = runDir(this.config.screenshot.save_path, stockCode, startedAt);
    await ensureDir(runDirPath);
    this.logger.info(`Collecting ${stockCode} into ${runDirPath}`);

    const session = this.createSession();
    await session.open();

    try {
      const ctx: RunContext = {
        stockCode,
        session,
        capturer: new ScreenshotCapturer(
          session,
          { format: this.config.screenshot.format, quality: this.config.screenshot.quality },
          this.logger.child("capture")
        ),
        runDir: runDirPath,
        record: emptyRecord(stockCode, startedAt, runDirPath),
        chartPageLoaded: false
      };

      const overviewUrl = stockPageUrl(this.config, "overview", stockCode);
      if (!(await session.navigate(overviewUrl, OVERVIEW_READY_SELECTORS))) {
        this.logger.error(`Overview page did not load for ${stockCode}, aborting run`);
        return null;
      }
      ctx.record.steps.push({ stage: "overview", status: "success", detail: null });

      await this.runStage(ctx, "basic_info", () => this.readBasicInfo(ctx));
      await this.runStage(ctx, "themes", () => this.readThemes(ctx));
      await this.runStage(ctx, "company_analysis", () => this.captureCompanyAnalysis(ctx));
      await this.runStage(ctx, "news", () => this.collectNews(ctx));
      await this.runStage(ctx, "investor_trends", () => this.collectInvestorTrends(ctx));
      await this.runStage(ctx, "chart_indicators", () => this.prepareAdvancedChart(ctx));
      await this.runStage(ctx, "advanced_charts", () => this.captureChartIntervals(ctx));

      const { record } = ctx;
      this.logger.info(
        `Collected ${stockCode} (${record.stock_name ?? "unknown"}): ` +
          `${record.news.length} news, ${record.investor_trends.length} trend rows, ` +
          `${Object.keys(record.screenshots).length} screenshots`
      );
      return record;
    } finally {
      await session.close();
    }
  }

  private async runStage(ctx: RunContext, stage: CollectionStage, work: () => Promise<StageReport>): Promise<void> {
    let result: StageReport;
    try {
      result = await work();
    } catch (error) {
      result = report([errorMessage(error)], true);
    }

    const detail = result.issues.length ? result.issues.join("; ") : null;
    ctx.record.steps.push({ stage, status: result.status, detail });

    if (result.status === "failed") {
      this.logger.error(`Stage ${stage} failed: ${detail ?? "no detail"}`);
    } else if (result.status === "degraded") {
      this.logger.warn(`Stage ${stage} degraded: ${detail ?? "no detail"}`);
    } else {
      this.logger.info(`Stage ${stage} complete`);
    }
  }

  private async capture(
    ctx: RunContext,
    label: string,
    issues: string[],
    take: (filePath: string) => Promise<CaptureOutcome>
  ): Promise<boolean> {
    const filePath = artifactPath(ctx.runDir, ctx.stockCode, label, this.config.screenshot.format, this.now());
    const outcome = await take(filePath);
    issues.push(...outcome.issues.map((issue) => `${label}: ${issue}`));
    if (outcome.status === "failed") return false;
    ctx.record.screenshots[label] = outcome.path;
    return true;
  }

  private async readBasicInfo(ctx: RunContext): Promise<StageReport> {
    const issues: string[] = [];
    const info = extractBasicInfo(await ctx.session.content());
    if (info.status === "failed") {
      return report([info.error], true);
    }
    if (info.status === "degraded") issues.push(...info.issues);

    const { record } = ctx;
    record.stock_name = info.value.stock_name;
    record.current_price = info.value.current_price;
    record.price_change = info.value.price_change;
    record.change_rate = info.value.change_rate;
    record.volume = info.value.volume;
    record.market_cap = info.value.market_cap;
    record.company_description = info.value.company_description;

    const label = info.value.stock_code_label;
    if (label && label !== ctx.stockCode) {
      issues.push(`stock_code_label: page shows ${label}`);
    }
    return report(issues);
  }

  private async readThemes(ctx: RunContext): Promise<StageReport> {
    const issues: string[] = [];
    ctx.record.related_themes = absorb(extractThemes(await ctx.session.content()), [], issues);
    return report(issues);
  }

  /**
   * The analysis page embeds its content in an iframe that only shows its own
   * viewport. Growing the frame to its content height lets one host-page
   * capture hold the whole report.
   */
  private async captureCompanyAnalysis(ctx: RunContext): Promise<StageReport> {
    const { session, capturer } = ctx;
    const timing = this.config.timing;
    const issues: string[] = [];

    if (!(await session.navigate(stockPageUrl(this.config, "company_analysis", ctx.stockCode)))) {
      return report(["company analysis page did not load"], true);
    }
    await session.wait(timing.analysis_page_settle_ms);

    try {
      const frameHeight = await session.measureFrameHeight(COMPANY_ANALYSIS_FRAME_XPATH);
      if (frameHeight === null || frameHeight <= 0) {
        issues.push("frame: not found, capturing host page");
      } else if (await session.resizeFrame(COMPANY_ANALYSIS_FRAME_XPATH, frameHeight)) {
        this.logger.debug(`Analysis frame resized to ${frameHeight}px`);
        await session.wait(timing.frame_resize_settle_ms);
      } else {
        issues.push("frame: resize had no target");
      }
    } catch (error) {
      issues.push(`frame: ${errorMessage(error)}, capturing host page`);
    }

    const captured = await this.capture(ctx, "company_analysis", issues, (filePath) =>
      capturer.captureFullPage(filePath)
    );
    return report(issues, !captured);
  }

  private async collectNews(ctx: RunContext): Promise<StageReport> {
    const { session, capturer } = ctx;
    const timing = this.config.timing;
    const issues: string[] = [];

    if (!(await session.navigate(stockPageUrl(this.config, "news", ctx.stockCode)))) {
      return report(["news page did not load"], true);
    }
    await session.wait(timing.page_settle_ms);
    await session.scrollToTop();
    await session.wait(timing.scroll_settle_ms);

    await this.capture(ctx, "news", issues, (filePath) => capturer.captureFullPage(filePath));
    ctx.record.news = absorb(extractNews(await session.content(), NEWS_LIMIT), [], issues);
    return report(issues);
  }

  private async collectInvestorTrends(ctx: RunContext): Promise<StageReport> {
    const { session, capturer } = ctx;
    const timing = this.config.timing;
    const issues: string[] = [];

    if (!(await session.navigate(stockPageUrl(this.config, "investor_trends", ctx.stockCode)))) {
      return report(["investor trends page did not load"], true);
    }
    await session.wait(timing.page_settle_ms);
    await session.scrollToTop();
    await session.wait(timing.scroll_settle_ms);

    await this.capture(ctx, "investor_trends", issues, (filePath) => capturer.captureFullPage(filePath));
    ctx.record.investor_trends = absorb(
      extractInvestorTrends(await session.content(), INVESTOR_TREND_LIMIT),
      [],
      issues
    );
    return report(issues);
  }

  /**
   * The charting widget gives no render-complete signal, so the page gets a
   * fixed settle time. Indicators are toggled through the study menu; a
   * missing menu item only costs that indicator.
   */
  private async prepareAdvancedChart(ctx: RunContext): Promise<StageReport> {
    const { session } = ctx;
    const timing = this.config.timing;

    if (!(await session.navigate(stockPageUrl(this.config, "advanced_chart", ctx.stockCode)))) {
      return report(["advanced chart page did not load"], true);
    }
    ctx.chartPageLoaded = true;
    await session.wait(timing.chart_render_settle_ms);

    if (!(await session.dispatchPointerClick(CHART_INDICATOR_SELECTORS.menu))) {
      return report(["indicator menu not found"]);
    }
    await session.wait(timing.indicator_menu_settle_ms);

    const issues: string[] = [];
    const enabled: string[] = [];
    for (const study of CHART_INDICATOR_SELECTORS.studies) {
      if (await session.dispatchPointerClick(study.selector)) {
        enabled.push(study.name);
      } else {
        issues.push(`indicator ${study.name}: menu item not found`);
      }
      await session.wait(timing.indicator_menu_settle_ms);
    }
    await session.wait(timing.indicator_apply_settle_ms);

    if (enabled.length) {
      this.logger.info(`Chart indicators enabled: ${enabled.join(", ")}`);
    }
    return report(issues);
  }

  private async captureChartIntervals(ctx: RunContext): Promise<StageReport> {
    if (!ctx.chartPageLoaded) {
      return report(["advanced chart page did not load"], true);
    }

    const { session, capturer } = ctx;
    const timing = this.config.timing;
    const issues: string[] = [];
    let captured = 0;

    for (const interval of CHART_INTERVALS) {
      try {
        if (!(await session.dispatchPointerClick(interval.selector))) {
          issues.push(`${interval.label}: interval control not found (${interval.selector})`);
          continue;
        }
        await session.wait(timing.chart_interval_settle_ms);
        if (interval.intraday) {
          await session.wait(timing.intraday_extra_settle_ms);
        }

        const ok = await this.capture(ctx, interval.label, issues, (filePath) =>
          capturer.captureElement(CHART_AREA_SELECTORS, filePath)
        );
        if (ok) captured += 1;
      } catch (error) {
        issues.push(`${interval.label}: ${errorMessage(error)}`);
      }
    }

    return report(issues, captured === 0);
  }
}
