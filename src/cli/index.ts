#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command } from "commander";
import pkg from "../../package.json";
import { resolveEnvFile } from "./env";
import { runAnalyzeCommand } from "../commands/analyze";
import { runCollectCommand } from "../commands/collect";
import { runInteractiveCommand } from "../commands/interactive";
import { runStrategiesCommand } from "../commands/strategies";

const defaultEnvPath = path.resolve(__dirname, "..", "..", ".env");
const envPath = resolveEnvFile(process.argv.slice(2), process.env, defaultEnvPath);
dotenv.config({ path: envPath });

const program = new Command();

program
  .name("stock-relay")
  .description("Collect Naver Finance stock pages and relay them to AI chat services")
  .version(pkg.version);

program
  .option("--env-file <path>", "Path to .env file (overrides STOCK_RELAY_ENV_FILE/DOTENV_CONFIG_PATH)", envPath)
  .option("--config <path>", "Path to config.yaml (overrides STOCK_RELAY_CONFIG)");

function configPath(): string | undefined {
  const value: unknown = program.opts().config;
  return typeof value === "string" ? value : undefined;
}

program
  .command("collect")
  .description("Collect one stock and save its record")
  .requiredOption("--code <code>", "Six digit stock code (e.g. 005930)")
  .action(async (opts: { code: string }) => {
    await runCollectCommand({ configPath: configPath(), code: opts.code });
  });

program
  .command("analyze")
  .description("Collect one stock, compose a strategy prompt and upload it")
  .requiredOption("--code <code>", "Six digit stock code (e.g. 005930)")
  .option("--strategy <key>", "Strategy key (1-5) or name; default magic_split_optimization")
  .option("--services <list>", "Comma separated AI services (chatgpt,claude,gemini)")
  .option("--yes", "Upload without asking for confirmation", false)
  .action(async (opts: { code: string; strategy?: string; services?: string; yes: boolean }) => {
    await runAnalyzeCommand({
      configPath: configPath(),
      code: opts.code,
      strategy: opts.strategy,
      services: opts.services,
      yes: opts.yes
    });
  });

program
  .command("strategies")
  .description("List strategies and the state of their templates")
  .action(async () => {
    await runStrategiesCommand({ configPath: configPath() });
  });

program
  .command("interactive", { isDefault: true })
  .description("Menu driven analysis loop")
  .action(async () => {
    await runInteractiveCommand({ configPath: configPath() });
  });

program.parseAsync().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
