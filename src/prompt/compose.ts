import type { StockRecord } from "../types/stockRecord";
import { pathExists } from "../utils/fs";

export const PROMPT_NEWS_COUNT = 3;
export const PROMPT_THEME_COUNT = 5;

const NOT_AVAILABLE = "n/a";

function orNa(value: string | null): string {
  return value ?? NOT_AVAILABLE;
}

export function stockSummary(record: StockRecord): string {
  const lines = [
    "[Stock summary]",
    `- Name: ${orNa(record.stock_name)} (${record.stock_code})`,
    `- Price: ${orNa(record.current_price)}`,
    `- Change: ${orNa(record.price_change)} (${orNa(record.change_rate)})`,
    `- Volume: ${orNa(record.volume)}`,
    `- Market cap: ${orNa(record.market_cap)}`
  ];

  const news = record.news.slice(0, PROMPT_NEWS_COUNT);
  if (news.length) {
    lines.push("", `[Recent news (top ${news.length})]`);
    news.forEach((item, index) => {
      lines.push(`${index + 1}. ${item.title} (${item.date}, ${item.source})`);
    });
  }

  if (record.related_themes.length) {
    lines.push("", `[Related themes] ${record.related_themes.slice(0, PROMPT_THEME_COUNT).join(", ")}`);
  }

  return lines.join("\n");
}

export function composePrompt(record: StockRecord, template: string): string {
  return `${stockSummary(record)}\n\n${template}`;
}

/** Screenshot paths in record order, keeping only files that still exist. */
export async function collectImagePaths(record: StockRecord): Promise<string[]> {
  const paths: string[] = [];
  for (const filePath of Object.values(record.screenshots)) {
    if (await pathExists(filePath)) paths.push(filePath);
  }
  return paths;
}
