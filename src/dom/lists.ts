import * as cheerio from "cheerio";
import {
  INVESTOR_TREND_MIN_CELLS,
  INVESTOR_TREND_SELECTORS,
  NEWS_SELECTORS,
  THEME_SELECTORS
} from "./selectors";
import { textFromElement } from "./query";
import { withIssues } from "../types/result";
import type { StepResult } from "../types/result";
import type { InvestorTrendRow, NewsItem } from "../types/stockRecord";

export const NEWS_LIMIT = 20;
export const INVESTOR_TREND_LIMIT = 10;

/**
 * Up to `limit` news items in page order. An item missing its link, date or
 * source is skipped; the rest are still returned.
 */
export function extractNews(html: string, limit = NEWS_LIMIT): StepResult<NewsItem[]> {
  const $ = cheerio.load(html);
  const issues: string[] = [];
  const items = $(NEWS_SELECTORS.item).toArray().slice(0, Math.max(0, limit));

  if (!items.length) {
    return withIssues([], [`news: no items matched ${NEWS_SELECTORS.item}`]);
  }

  const news: NewsItem[] = [];
  items.forEach((item, idx) => {
    const $item = $(item);
    const link = $item.find(NEWS_SELECTORS.title).first();
    const date = $item.find(NEWS_SELECTORS.date).first();
    const source = $item.find(NEWS_SELECTORS.source).first();

    const title = link.length ? (link.attr("title") ?? "").trim() || textFromElement(link) : "";
    if (!title || !date.length || !source.length) {
      const absent = [!title && "title", !date.length && "date", !source.length && "source"].filter(Boolean);
      issues.push(`news #${idx + 1}: missing ${absent.join(", ")}`);
      return;
    }

    news.push({
      index: idx + 1,
      title,
      date: textFromElement(date),
      source: textFromElement(source)
    });
  });

  return withIssues(news, issues);
}

/**
 * Up to `limit` rows after the header of the first investor trend table. Rows
 * with fewer than six cells are spacers or sub-headers and are dropped.
 */
export function extractInvestorTrends(
  html: string,
  limit = INVESTOR_TREND_LIMIT
): StepResult<InvestorTrendRow[]> {
  const $ = cheerio.load(html);
  const table = $(INVESTOR_TREND_SELECTORS.table).first();
  if (!table.length) {
    return withIssues([], [`investor_trends: no table matched ${INVESTOR_TREND_SELECTORS.table}`]);
  }

  const rows = table.find(INVESTOR_TREND_SELECTORS.row).toArray().slice(1, 1 + Math.max(0, limit));
  const trends: InvestorTrendRow[] = [];
  rows.forEach((row, idx) => {
    const cells = $(row)
      .find(INVESTOR_TREND_SELECTORS.cell)
      .toArray()
      .map((cell) => textFromElement($(cell)));
    if (cells.length < INVESTOR_TREND_MIN_CELLS) return;
    trends.push({
      index: idx + 1,
      date: cells[0],
      foreign_buy: cells[1],
      foreign_sell: cells[2],
      institution_buy: cells[3],
      institution_sell: cells[4],
      individual_volume: cells[5]
    });
  });

  return withIssues(trends, []);
}

export function extractThemes(html: string): StepResult<string[]> {
  const $ = cheerio.load(html);
  const panel = $(THEME_SELECTORS.panel).first();
  if (!panel.length) {
    return withIssues([], [`themes: no panel matched ${THEME_SELECTORS.panel}`]);
  }

  const themes: string[] = [];
  for (const link of panel.find(THEME_SELECTORS.link).toArray()) {
    const text = textFromElement($(link));
    if (text && !themes.includes(text)) themes.push(text);
  }
  return withIssues(themes, []);
}
