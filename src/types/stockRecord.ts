export interface NewsItem {
  index: number;
  title: string;
  date: string;
  source: string;
}

export interface InvestorTrendRow {
  index: number;
  date: string;
  foreign_buy: string;
  foreign_sell: string;
  institution_buy: string;
  institution_sell: string;
  individual_volume: string;
}

export type CollectionStage =
  | "overview"
  | "basic_info"
  | "themes"
  | "company_analysis"
  | "news"
  | "investor_trends"
  | "chart_indicators"
  | "advanced_charts";

export interface StepOutcome {
  stage: CollectionStage;
  status: "success" | "degraded" | "failed";
  detail: string | null;
}

export interface StockRecord {
  stock_code: string;
  stock_name: string | null;
  current_price: string | null;
  price_change: string | null;
  change_rate: string | null;
  volume: string | null;
  market_cap: string | null;
  company_description: string | null;
  news: NewsItem[];
  investor_trends: InvestorTrendRow[];
  related_themes: string[];
  /** Capture-kind label to image path. */
  screenshots: Record<string, string>;
  financial_data: Record<string, string>;
  technical_indicators: Record<string, string>;
  collected_at: string;
  run_dir: string;
  steps: StepOutcome[];
}
