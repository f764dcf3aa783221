import { AI_SERVICES } from "../config/schema";
import type { AiServiceName, StrategyName } from "../config/schema";
import { ConsolePrompt } from "../cli/prompt";
import { collectAndSave, formatRecordSummary } from "./collect";
import type { CollectedStock } from "./collect";
import { createAppContext } from "./context";
import type { AppContext } from "./context";
import { reportInvalidTemplates } from "./strategies";
import { collectImagePaths, composePrompt } from "../prompt/compose";
import { describeStrategy, resolveStrategy, validateStockCode } from "../prompt/strategies";
import { PromptTemplates } from "../prompt/templates";
import { createPlaywrightAutomator } from "../upload/automator";
import type { LoginPrompt } from "../upload/playwrightUploaders";
import { formatUploadSummary } from "../upload/summary";
import type { UploadResult } from "../upload/types";

export interface AnalyzeCommandOptions {
  configPath?: string;
  code: string;
  strategy?: string;
  services?: string;
  yes?: boolean;
}

export interface AnalyzeIo {
  confirm(question: string): Promise<boolean>;
  onLoginRequired: LoginPrompt;
}

export interface AnalyzeOutcome {
  collected: CollectedStock;
  strategy: StrategyName;
  prompt: string;
  imagePaths: string[];
  /** Empty when the operator declined the upload. */
  results: UploadResult[];
}

function isAiService(value: string): value is AiServiceName {
  return (AI_SERVICES as readonly string[]).includes(value);
}

/** Parse a comma separated service list such as `chatgpt,claude`; repeats count once. */
export function parseServices(list: string): AiServiceName[] {
  const names = [
    ...new Set(
      list
        .split(",")
        .map((name) => name.trim().toLowerCase())
        .filter(Boolean)
    )
  ];
  const unknown = names.filter((name) => !isAiService(name));
  if (unknown.length) {
    throw new Error(`Unknown AI service(s): ${unknown.join(", ")} (expected ${AI_SERVICES.join(", ")})`);
  }
  return names.filter(isAiService);
}

export function consoleLoginPrompt(prompt: ConsolePrompt): LoginPrompt {
  return (displayName) => prompt.pause(`Log in to ${displayName} in the opened browser, then press Enter: `);
}

/** Collect, compose the prompt for `strategy` and hand it to the AI services. */
export async function analyzeStock(
  app: AppContext,
  templates: PromptTemplates,
  request: { code: string; strategy: StrategyName; services?: AiServiceName[] },
  io: AnalyzeIo
): Promise<AnalyzeOutcome> {
  const collected = await collectAndSave(app, request.code);
  console.log(formatRecordSummary(collected.record, collected.jsonPath));

  const template = await templates.render(request.strategy);
  const prompt = composePrompt(collected.record, template);
  const imagePaths = await collectImagePaths(collected.record);
  console.log(`Strategy: ${describeStrategy(request.strategy)}`);
  console.log(`Prompt: ${prompt.length} characters, ${imagePaths.length} image(s)`);

  const outcome: AnalyzeOutcome = { collected, strategy: request.strategy, prompt, imagePaths, results: [] };
  if (!(await io.confirm("Upload to the AI services now?"))) {
    app.logger.info("Upload skipped by operator");
    return outcome;
  }

  const automator = createPlaywrightAutomator(app.config, app.logger.child("upload"), io.onLoginRequired);
  outcome.results = await automator.upload({ prompt, imagePaths }, request.services);
  console.log(formatUploadSummary(outcome.results));
  return outcome;
}

export async function runAnalyzeCommand(options: AnalyzeCommandOptions): Promise<void> {
  const code = validateStockCode(options.code);
  if (!code) {
    throw new Error(`Stock code must be six digits (e.g. 005930), got "${options.code}"`);
  }
  const services = options.services ? parseServices(options.services) : undefined;

  const app = await createAppContext(options.configPath);
  const templates = new PromptTemplates(app.config, app.logger.child("templates"));
  await reportInvalidTemplates(templates, app.logger);
  const strategy = resolveStrategy(options.strategy ?? "", templates.strategies);
  if (!strategy) {
    throw new Error(`Unknown or disabled strategy: ${options.strategy ?? ""}`);
  }

  const prompt = new ConsolePrompt();
  try {
    const outcome = await analyzeStock(
      app,
      templates,
      { code, strategy, services },
      {
        confirm: (question) => (options.yes ? Promise.resolve(true) : prompt.confirm(question)),
        onLoginRequired: consoleLoginPrompt(prompt)
      }
    );
    if (outcome.results.length && outcome.results.every((result) => !result.success)) {
      process.exitCode = 1;
    }
  } finally {
    prompt.close();
  }
}
