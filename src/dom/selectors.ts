/**
 * Selector candidates for the Naver Finance pages, most specific first.
 * Markup on these pages is not ours; when a redesign breaks a field, the
 * extraction log names the candidates that were tried.
 */

export const OVERVIEW_READY_SELECTORS = [".chart_area", "#chart", ".graph_wrap", ".today", "body"] as const;

export const BASIC_INFO_SELECTORS = {
  stock_name: [".wrap_company h2 a", ".wrap_company h2"],
  stock_code_label: [".wrap_company .description .code"],
  current_price: [".today .no_today em .blind", ".today .no_today em"],
  price_change_ems: [".today .no_exday em"],
  volume: [".no_info td:has(.sp_txt9) em .blind", ".no_info tr:first-child td:nth-child(3) em .blind"],
  market_cap: ["#_market_sum", ".first .line_dot #_market_sum"],
  company_description: [".summary_info p"]
} as const;

/** Paragraphs starting with this marker are source attributions, not description. */
export const DESCRIPTION_SOURCE_PREFIX = "출처";

export const NEWS_SELECTORS = {
  item: ".tb_cont, .newsList li",
  title: "a",
  date: ".date, .wdate",
  source: ".press, .info_policy"
} as const;

export const INVESTOR_TREND_SELECTORS = {
  table: ".type2, .tb_cont",
  row: "tr",
  cell: "td"
} as const;

export const INVESTOR_TREND_MIN_CELLS = 6;

export const THEME_SELECTORS = {
  panel: ".group_theme",
  link: "a"
} as const;

export const COMPANY_ANALYSIS_FRAME_XPATH = "/html/body/div[3]/div[2]/div[2]/div[1]/div[3]/iframe";

export const CHART_AREA_SELECTORS = ["cq-context", ".chart_area", "#chart"] as const;

const STUDY_MENU = '//*[@id="content"]/div[3]/cq-context/div[1]/div[1]/div/div[2]/cq-menu';
const STUDY_ITEMS = `${STUDY_MENU}/cq-menu-dropdown/cq-scroll/cq-studies/cq-studies-content`;

export const CHART_INDICATOR_SELECTORS = {
  menu: `xpath=${STUDY_MENU}/span`,
  studies: [
    { name: "MACD", selector: `xpath=${STUDY_ITEMS}/cq-item[9]/cq-label` },
    { name: "RSI", selector: `xpath=${STUDY_ITEMS}/cq-item[12]` },
    { name: "Stochastic", selector: `xpath=${STUDY_ITEMS}/cq-item[15]` }
  ]
} as const;

export interface ChartInterval {
  label: string;
  selector: string;
  /** Intra-day candles take longer to redraw. */
  intraday: boolean;
}

export const CHART_INTERVALS: readonly ChartInterval[] = [
  { label: "chart_month", selector: "div.month:not(.selected)", intraday: false },
  { label: "chart_week", selector: "div.week:not(.selected)", intraday: false },
  { label: "chart_day", selector: "div.day:not(.selected)", intraday: false },
  { label: "chart_1hour", selector: 'cq-item[interval="60"]', intraday: true }
];
