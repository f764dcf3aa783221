import { recordPath } from "./paths";
import { writeJson } from "../utils/fs";
import type { StockRecord } from "../types/stockRecord";

export async function saveRecord(record: StockRecord, dataDir: string, savedAt = new Date()): Promise<string> {
  const filePath = recordPath(dataDir, record.stock_code, savedAt);
  await writeJson(filePath, record);
  return filePath;
}
