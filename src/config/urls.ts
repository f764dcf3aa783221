import type { AppConfig } from "./schema";

export type StockPage = "overview" | "company_analysis" | "news" | "investor_trends" | "advanced_chart";

const ITEM_PAGES: Record<Exclude<StockPage, "overview">, string> = {
  company_analysis: "coinfo.naver",
  news: "news.naver",
  investor_trends: "frgn.naver",
  advanced_chart: "fchart.naver"
};

export function stockPageUrl(config: AppConfig, page: StockPage, stockCode: string): string {
  const code = encodeURIComponent(stockCode);
  if (page === "overview") {
    return `${config.naver_finance.stock_url}?code=${code}`;
  }
  const base = config.naver_finance.base_url.replace(/\/+$/, "");
  return `${base}/item/${ITEM_PAGES[page]}?code=${code}`;
}
