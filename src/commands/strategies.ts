import { createAppContext } from "./context";
import type { StrategyName } from "../config/schema";
import { STRATEGY_KEYS } from "../prompt/strategies";
import { PromptTemplates } from "../prompt/templates";
import type { TemplateInfo } from "../prompt/templates";
import type { Logger } from "../utils/logger";

export function formatStrategyLine(key: string, info: TemplateInfo): string {
  const status = !info.exists ? "missing" : info.valid ? "ok" : "invalid";
  return `${key}. ${info.name} [${status}] ${info.description}`;
}

/** Validate every enabled template at startup and log the ones that cannot be used. */
export async function reportInvalidTemplates(templates: PromptTemplates, logger: Logger): Promise<StrategyName[]> {
  const invalid: StrategyName[] = [];
  for (const [name, valid] of await templates.validateAll()) {
    if (valid) continue;
    invalid.push(name);
    logger.warn(`Template for ${name} is not usable: ${templates.templatePath(name)}`);
  }
  return invalid;
}

export async function runStrategiesCommand(options: { configPath?: string }): Promise<void> {
  const app = await createAppContext(options.configPath);
  const templates = new PromptTemplates(app.config, app.logger.child("templates"));

  for (const [key, name] of Object.entries(STRATEGY_KEYS)) {
    if (!templates.strategies.includes(name)) continue;
    console.log(formatStrategyLine(key, await templates.info(name)));
  }
}
