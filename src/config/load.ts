import path from "path";
import { parse as parseYaml } from "yaml";
import type { ZodIssue } from "zod";
import { AppConfigSchema } from "./schema";
import type { AppConfig } from "./schema";
import { pathExists, readText } from "../utils/fs";
import { ConfigError } from "../errors";
import type { Logger } from "../utils/logger";

export const DEFAULT_CONFIG_PATH = path.join("config", "config.yaml");

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => `${issue.path.length ? issue.path.join(".") : "<root>"}: ${issue.message}`)
    .join("; ");
}

export function parseConfig(data: unknown, label = "config"): AppConfig {
  const result = AppConfigSchema.safeParse(data ?? {});
  if (!result.success) {
    throw new ConfigError(`${label} is invalid: ${formatIssues(result.error.issues)}`);
  }
  return result.data;
}

/**
 * Load the YAML configuration. A missing file yields the defaults; a file that
 * does not match the schema (including unknown AI service keys) is rejected.
 */
export async function loadConfig(configPath: string, logger?: Logger): Promise<AppConfig> {
  if (!(await pathExists(configPath))) {
    logger?.warn(`Config file not found, using defaults: ${configPath}`);
    return parseConfig({}, configPath);
  }

  const raw = await readText(configPath);
  let data: unknown;
  try {
    data = parseYaml(raw);
  } catch (error) {
    throw new ConfigError(`Could not parse ${configPath}`, { cause: error });
  }

  const config = parseConfig(data, configPath);
  logger?.info(`Loaded config: ${configPath}`);
  return config;
}
