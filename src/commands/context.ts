import path from "path";
import { DEFAULT_CONFIG_PATH, loadConfig } from "../config/load";
import type { AppConfig } from "../config/schema";
import { Logger } from "../utils/logger";

export interface AppContext {
  config: AppConfig;
  logger: Logger;
  configPath: string;
}

export function resolveConfigPath(cliValue?: string): string {
  return path.resolve(cliValue ?? process.env.STOCK_RELAY_CONFIG ?? DEFAULT_CONFIG_PATH);
}

/** Built once per process and handed to every component. */
export async function createAppContext(configPathOption?: string): Promise<AppContext> {
  const configPath = resolveConfigPath(configPathOption);
  const config = await loadConfig(configPath, new Logger({ level: "warn", scope: "config" }));
  const logger = new Logger({
    level: config.logging.level,
    scope: "stock-relay",
    filePath: config.logging.file_path,
    maxBytes: config.logging.max_bytes,
    retention: config.logging.retention
  });
  logger.debug(`Using config ${configPath}`);
  return { config, logger, configPath };
}
