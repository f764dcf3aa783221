import * as cheerio from "cheerio";
import { BASIC_INFO_SELECTORS, DESCRIPTION_SOURCE_PREFIX } from "./selectors";
import { blindOrText, firstText, missing, textFromElement } from "./query";
import { stripThousands } from "../utils/text";
import { withIssues } from "../types/result";
import type { StepResult } from "../types/result";

export interface BasicInfo {
  stock_name: string | null;
  stock_code_label: string | null;
  current_price: string | null;
  price_change: string | null;
  change_rate: string | null;
  volume: string | null;
  market_cap: string | null;
  company_description: string | null;
}

/** "삼성전자 : 네이버페이 증권" -> "삼성전자". Titles without a colon carry no name. */
export function nameFromTitle(title: string): string | null {
  const index = title.indexOf(":");
  if (index < 0) return null;
  const name = title.slice(0, index).trim();
  return name || null;
}

/**
 * Read the overview page's identity and quote fields. Every field is looked up
 * on its own, so one missing element leaves only that field null.
 */
export function extractBasicInfo(html: string): StepResult<BasicInfo> {
  const $ = cheerio.load(html);
  const issues: string[] = [];

  const read = (field: keyof typeof BASIC_INFO_SELECTORS, candidates: readonly string[]): string | null => {
    const match = firstText($, candidates);
    if (!match) {
      issues.push(missing(field, candidates));
      return null;
    }
    return match.text;
  };

  let stockName = read("stock_name", BASIC_INFO_SELECTORS.stock_name);
  if (!stockName) {
    stockName = nameFromTitle(textFromElement($("title").first()));
    if (stockName) issues.push("stock_name: derived from page title");
  }

  const stockCodeLabel = read("stock_code_label", BASIC_INFO_SELECTORS.stock_code_label);
  const currentPrice = read("current_price", BASIC_INFO_SELECTORS.current_price);

  let priceChange: string | null = null;
  let changeRate: string | null = null;
  const changeEms = $(BASIC_INFO_SELECTORS.price_change_ems.join(", "));
  if (changeEms.length >= 2) {
    priceChange = stripThousands(blindOrText(changeEms.eq(0))) || null;
    changeRate = blindOrText(changeEms.eq(1)) || null;
  } else {
    issues.push(`price_change: expected two values under ${BASIC_INFO_SELECTORS.price_change_ems.join(" | ")}`);
  }

  const volume = read("volume", BASIC_INFO_SELECTORS.volume);
  const marketCap = read("market_cap", BASIC_INFO_SELECTORS.market_cap);

  const paragraphs = $(BASIC_INFO_SELECTORS.company_description.join(", "))
    .toArray()
    .map((element) => textFromElement($(element)))
    .filter((text) => text.length > 0 && !text.startsWith(DESCRIPTION_SOURCE_PREFIX));
  const companyDescription = paragraphs.length ? paragraphs.join(" ") : null;
  if (!companyDescription) {
    issues.push(missing("company_description", BASIC_INFO_SELECTORS.company_description));
  }

  return withIssues(
    {
      stock_name: stockName,
      stock_code_label: stockCodeLabel,
      current_price: currentPrice === null ? null : stripThousands(currentPrice),
      price_change: priceChange,
      change_rate: changeRate,
      volume,
      market_cap: marketCap,
      company_description: companyDescription
    },
    issues
  );
}
