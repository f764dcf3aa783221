import path from "path";
import type { ImageFormat } from "../browser/session";
import { fileStamp, runDirStamp } from "../utils/time";

/** `<base>/<code>_<YYMMDDHHmm>`, one per collection run. */
export function runDir(baseDir: string, stockCode: string, startedAt: Date): string {
  return path.join(baseDir, `${stockCode}_${runDirStamp(startedAt)}`);
}

export function artifactPath(
  runDirPath: string,
  stockCode: string,
  label: string,
  format: ImageFormat,
  capturedAt: Date
): string {
  return path.join(runDirPath, `${stockCode}_${label}_${fileStamp(capturedAt)}.${format}`);
}

export function recordPath(dataDir: string, stockCode: string, savedAt: Date): string {
  return path.join(dataDir, `${stockCode}_${fileStamp(savedAt)}.json`);
}
