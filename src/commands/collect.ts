import { StockCollector } from "../collect/collector";
import { saveRecord } from "../io/record";
import { validateStockCode } from "../prompt/strategies";
import type { StockRecord } from "../types/stockRecord";
import { createAppContext } from "./context";
import type { AppContext } from "./context";

export interface CollectCommandOptions {
  configPath?: string;
  code: string;
}

export interface CollectedStock {
  record: StockRecord;
  jsonPath: string;
}

export function formatRecordSummary(record: StockRecord, jsonPath: string): string {
  const lines = [
    `Collected: ${record.stock_name ?? "unknown"} (${record.stock_code})`,
    `  Price: ${record.current_price ?? "n/a"} (${record.change_rate ?? "n/a"})`,
    `  News items: ${record.news.length}`,
    `  Investor trend rows: ${record.investor_trends.length}`,
    `  Screenshots: ${Object.keys(record.screenshots).length} in ${record.run_dir}`,
    `  Data: ${jsonPath}`
  ];
  const degraded = record.steps.filter((step) => step.status !== "success");
  if (degraded.length) {
    lines.push(`  Incomplete stages: ${degraded.map((step) => `${step.stage} (${step.status})`).join(", ")}`);
  }
  return lines.join("\n");
}

/** Collect and persist one stock. Throws when the run produced no record. */
export async function collectAndSave(app: AppContext, code: string): Promise<CollectedStock> {
  const collector = new StockCollector(app.config, app.logger.child("collector"));
  const record = await collector.collect(code);
  if (!record) {
    throw new Error(`Data collection failed for ${code}: overview page did not load`);
  }
  const jsonPath = await saveRecord(record, app.config.data.save_path);
  app.logger.info(`Record saved: ${jsonPath}`);
  return { record, jsonPath };
}

export async function runCollectCommand(options: CollectCommandOptions): Promise<void> {
  const code = validateStockCode(options.code);
  if (!code) {
    throw new Error(`Stock code must be six digits (e.g. 005930), got "${options.code}"`);
  }
  const app = await createAppContext(options.configPath);
  const { record, jsonPath } = await collectAndSave(app, code);
  console.log(formatRecordSummary(record, jsonPath));
}
