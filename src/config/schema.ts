import { z } from "zod";

export const AI_SERVICES = ["chatgpt", "claude", "gemini"] as const;
export type AiServiceName = (typeof AI_SERVICES)[number];

export const STRATEGY_NAMES = [
  "magic_split_optimization",
  "short_term_discovery",
  "buy_timing_diagnosis",
  "hold_or_cut_decision",
  "valuation_analysis"
] as const;
export type StrategyName = (typeof STRATEGY_NAMES)[number];

const WindowSizeSchema = z
  .string()
  .regex(/^\d+\s*,\s*\d+$/, 'window_size must look like "1920,1080"');

const ChromeSchema = z.object({
  headless: z.boolean().default(false),
  window_size: WindowSizeSchema.default("1920,1080"),
  user_agent: z
    .string()
    .min(1)
    .default(
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36"
    ),
  user_data_dir: z.string().min(1).nullable().default(null)
});

const WebDriverSchema = z.object({
  chrome: ChromeSchema.default({}),
  /** Seconds to wait for each page-ready selector. */
  wait_timeout: z.number().positive().default(10),
  /** Seconds allowed for single element lookups and screenshots. */
  implicit_wait: z.number().positive().default(3)
});

const NaverFinanceSchema = z.object({
  base_url: z.string().url().default("https://finance.naver.com"),
  stock_url: z.string().url().default("https://finance.naver.com/item/main.naver"),
  /** Seconds to pause after every navigation. */
  delay_between_requests: z.number().nonnegative().default(2)
});

const ScreenshotSchema = z.object({
  save_path: z.string().min(1).default("screenshots"),
  format: z.enum(["png", "jpeg"]).default("png"),
  quality: z.number().int().min(1).max(100).default(95)
});

const DataSchema = z.object({
  save_path: z.string().min(1).default("data")
});

const AiServiceSchema = z.object({
  url: z.string().url(),
  enabled: z.boolean().default(true)
});

const AiServicesSchema = z
  .object({
    chatgpt: AiServiceSchema.default({ url: "https://chat.openai.com", enabled: true }),
    claude: AiServiceSchema.default({ url: "https://claude.ai", enabled: true }),
    gemini: AiServiceSchema.default({ url: "https://gemini.google.com", enabled: true })
  })
  .strict();

const MagicSplitSchema = z.object({
  default_strategy: z
    .object({
      first_buy_profit: z.number().default(10),
      additional_buy_drop: z.number().default(15),
      additional_buy_profit: z.number().default(15),
      max_buy_count: z.number().int().positive().default(20)
    })
    .default({})
});

const PromptsSchema = z.object({
  templates_path: z.string().min(1).default("prompts/templates"),
  strategies: z.array(z.enum(STRATEGY_NAMES)).min(1).default([...STRATEGY_NAMES])
});

const LoggingSchema = z.object({
  level: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(["debug", "info", "warn", "error", "silent"]))
    .default("info"),
  /** Null turns the file sink off. */
  file_path: z.string().min(1).nullable().default("logs/stock-relay.log"),
  /** The file is rotated once it would grow past this size. */
  max_bytes: z.number().int().positive().default(10 * 1024 * 1024),
  /** Rotated files kept beside the current one. */
  retention: z.number().int().nonnegative().default(7)
});

const durationMs = (fallback: number) => z.number().int().nonnegative().default(fallback);

const TimingSchema = z.object({
  analysis_page_settle_ms: durationMs(5000),
  frame_resize_settle_ms: durationMs(3000),
  page_settle_ms: durationMs(3000),
  scroll_settle_ms: durationMs(2000),
  chart_render_settle_ms: durationMs(10000),
  indicator_menu_settle_ms: durationMs(1000),
  indicator_apply_settle_ms: durationMs(2000),
  chart_interval_settle_ms: durationMs(5000),
  intraday_extra_settle_ms: durationMs(3000),
  upload_page_settle_ms: durationMs(3000),
  upload_image_settle_ms: durationMs(2000),
  service_switch_delay_ms: durationMs(3000)
});

export const AppConfigSchema = z.object({
  webdriver: WebDriverSchema.default({}),
  naver_finance: NaverFinanceSchema.default({}),
  screenshot: ScreenshotSchema.default({}),
  data: DataSchema.default({}),
  ai_services: AiServicesSchema.default({}),
  magic_split: MagicSplitSchema.default({}),
  prompts: PromptsSchema.default({}),
  logging: LoggingSchema.default({}),
  timing: TimingSchema.default({})
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type MagicSplitParameters = AppConfig["magic_split"]["default_strategy"];

export interface ViewportSize {
  width: number;
  height: number;
}

export function parseWindowSize(windowSize: string): ViewportSize {
  const [width, height] = windowSize.split(",").map((part) => Number.parseInt(part.trim(), 10));
  return { width, height };
}
