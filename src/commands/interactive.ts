import { ConsolePrompt } from "../cli/prompt";
import { analyzeStock, consoleLoginPrompt } from "./analyze";
import { createAppContext } from "./context";
import { reportInvalidTemplates } from "./strategies";
import type { MagicSplitParameters, StrategyName } from "../config/schema";
import { BrowserLaunchError, ConfigError, errorMessage } from "../errors";
import { DEFAULT_STRATEGY, STRATEGY_KEYS, describeStrategy, resolveStrategy, validateStockCode } from "../prompt/strategies";
import { PromptTemplates } from "../prompt/templates";
import type { TemplateInfo } from "../prompt/templates";

const QUIT_ANSWERS = new Set(["q", "quit", "exit"]);
const RULE = "-".repeat(60);

export type MenuCommand =
  | { kind: "quit" }
  | { kind: "help" }
  | { kind: "redraw" }
  | { kind: "strategy"; strategy: StrategyName }
  | { kind: "invalid"; input: string };

export function parseMenuInput(input: string, available: readonly StrategyName[]): MenuCommand {
  const value = input.trim().toLowerCase();
  if (QUIT_ANSWERS.has(value)) return { kind: "quit" };
  if (value === "h") return { kind: "help" };
  if (value === "r") return { kind: "redraw" };
  const strategy = resolveStrategy(value, available);
  return strategy ? { kind: "strategy", strategy } : { kind: "invalid", input: input.trim() };
}

function menuEntries(available: readonly StrategyName[]): [string, StrategyName][] {
  return Object.entries(STRATEGY_KEYS).filter(([, name]) => available.includes(name));
}

export function formatMenu(available: readonly StrategyName[]): string {
  const lines = ["", "Analysis strategies:"];
  for (const [key, name] of menuEntries(available)) {
    const marker = name === DEFAULT_STRATEGY ? " (default)" : "";
    lines.push(`  ${key}. ${describeStrategy(name)}${marker}`);
  }
  lines.push("", "  q: quit   h: help   r: redraw");
  return lines.join("\n");
}

export function formatHelp(available: readonly StrategyName[], params: MagicSplitParameters): string {
  const lines = ["", "Strategies:"];
  for (const [key, name] of menuEntries(available)) {
    lines.push(`  [${key}] ${describeStrategy(name)}`);
  }
  lines.push(
    "",
    "Usage:",
    "  1. Pick a strategy by key or name (Enter for the default).",
    "  2. Enter a six digit stock code, e.g. 005930.",
    "  3. Pages are collected and the prompt is uploaded after confirmation.",
    "  4. Read the answers in each AI service's browser tab.",
    "",
    "Magic Split parameters:",
    `  First lot sold at +${params.first_buy_profit}%`,
    `  Additional buy every -${params.additional_buy_drop}%`,
    `  Staged profit taking every +${params.additional_buy_profit}%`,
    `  At most ${params.max_buy_count} splits`
  );
  return lines.join("\n");
}

export function formatStrategyDetails(info: TemplateInfo): string {
  const lines = ["", `Selected strategy: ${info.description}`];
  if (!info.exists) {
    lines.push(`Template not found: ${info.file_path}`);
    return lines.join("\n");
  }
  lines.push("", "Prompt preview:", RULE, info.content_preview, RULE);
  if (!info.valid) lines.push("Warning: this template did not pass validation.");
  return lines.join("\n");
}

export async function runInteractiveCommand(options: { configPath?: string }): Promise<void> {
  const app = await createAppContext(options.configPath);
  const templates = new PromptTemplates(app.config, app.logger.child("templates"));
  await reportInvalidTemplates(templates, app.logger);
  const prompt = new ConsolePrompt();

  try {
    for (;;) {
      console.log(formatMenu(templates.strategies));
      const choice = await prompt.ask("Select a strategy (Enter for default): ");
      const command = parseMenuInput(choice, templates.strategies);

      if (command.kind === "quit") break;
      if (command.kind === "redraw") continue;
      if (command.kind === "help") {
        console.log(formatHelp(templates.strategies, app.config.magic_split.default_strategy));
        await prompt.pause("Press Enter to continue...");
        continue;
      }
      if (command.kind === "invalid") {
        console.log(`Invalid choice: ${command.input}. Enter a key (1-5) or a strategy name.`);
        continue;
      }

      const { strategy } = command;
      console.log(formatStrategyDetails(await templates.info(strategy)));
      if (!(await prompt.confirm("Use this strategy?"))) continue;

      const code = validateStockCode(await prompt.ask("Stock code (6 digits, e.g. 005930): "));
      if (!code) {
        console.log("Stock code must be six digits.");
        continue;
      }

      try {
        await analyzeStock(
          app,
          templates,
          { code, strategy },
          { confirm: (question) => prompt.confirm(question), onLoginRequired: consoleLoginPrompt(prompt) }
        );
      } catch (error) {
        if (error instanceof BrowserLaunchError || error instanceof ConfigError) throw error;
        app.logger.error(`Analysis of ${code} failed: ${errorMessage(error)}`);
      }

      if (!(await prompt.confirm("Analyze another stock?"))) break;
    }
  } finally {
    prompt.close();
  }
  console.log("Bye.");
}
