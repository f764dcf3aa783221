import { promises as fs } from "fs";
import path from "path";
import type { AppConfig, StrategyName } from "../config/schema";
import { describeStrategy } from "./strategies";
import { TemplateError } from "../errors";
import { pathExists, readText } from "../utils/fs";
import type { Logger } from "../utils/logger";
import { preview } from "../utils/text";

/** A template must mention at least one of these to be considered usable. */
export const REQUIRED_KEYWORDS = ["Magic Split", "stock", "analysis"] as const;

const PREVIEW_LENGTH = 200;
const PLACEHOLDER = /\{\{\s*([a-z_]+)\s*\}\}/g;

export interface TemplateInfo {
  name: StrategyName;
  description: string;
  file_path: string;
  exists: boolean;
  valid: boolean;
  size: number;
  content_preview: string;
}

export class PromptTemplates {
  private readonly cache = new Map<StrategyName, string>();
  private readonly templatesDir: string;

  constructor(
    private readonly config: AppConfig,
    private readonly logger: Logger
  ) {
    this.templatesDir = config.prompts.templates_path;
  }

  get strategies(): readonly StrategyName[] {
    return this.config.prompts.strategies;
  }

  templatePath(name: StrategyName): string {
    return path.join(this.templatesDir, `${name}.txt`);
  }

  private assertAvailable(name: StrategyName): void {
    if (!this.strategies.includes(name)) {
      throw new TemplateError(`Strategy is not enabled: ${name}`);
    }
  }

  /** Raw template text, cached after the first read. */
  async load(name: StrategyName): Promise<string> {
    this.assertAvailable(name);
    const cached = this.cache.get(name);
    if (cached !== undefined) return cached;

    const filePath = this.templatePath(name);
    if (!(await pathExists(filePath))) {
      throw new TemplateError(`Template file not found: ${filePath}`);
    }
    const content = await readText(filePath);
    this.cache.set(name, content);
    this.logger.debug(`Loaded template ${name}`);
    return content;
  }

  async reload(name: StrategyName): Promise<string> {
    this.cache.delete(name);
    return this.load(name);
  }

  clearCache(): void {
    this.cache.clear();
  }

  /** Template text with `{{placeholder}}` values from the magic_split settings filled in. */
  async render(name: StrategyName): Promise<string> {
    const content = await this.load(name);
    const values: Record<string, number> = this.config.magic_split.default_strategy;
    return content.replace(PLACEHOLDER, (match, key: string) =>
      key in values ? String(values[key]) : match
    );
  }

  async validate(name: StrategyName): Promise<boolean> {
    const filePath = this.templatePath(name);
    if (!(await pathExists(filePath))) {
      this.logger.error(`Template file missing: ${filePath}`);
      return false;
    }
    const content = await readText(filePath);
    if (!content.trim()) {
      this.logger.error(`Template file is empty: ${filePath}`);
      return false;
    }
    if (!REQUIRED_KEYWORDS.some((keyword) => content.includes(keyword))) {
      this.logger.warn(`Template has none of ${REQUIRED_KEYWORDS.join(", ")}: ${filePath}`);
      return false;
    }
    return true;
  }

  async validateAll(): Promise<Map<StrategyName, boolean>> {
    const results = new Map<StrategyName, boolean>();
    for (const name of this.strategies) {
      results.set(name, await this.validate(name));
    }
    const passed = [...results.values()].filter(Boolean).length;
    this.logger.info(`Templates valid: ${passed}/${results.size}`);
    return results;
  }

  async info(name: StrategyName): Promise<TemplateInfo> {
    const filePath = this.templatePath(name);
    const info: TemplateInfo = {
      name,
      description: describeStrategy(name),
      file_path: filePath,
      exists: await pathExists(filePath),
      valid: false,
      size: 0,
      content_preview: ""
    };
    if (!info.exists) return info;

    const stat = await fs.stat(filePath);
    info.size = stat.size;
    info.content_preview = preview(await readText(filePath), PREVIEW_LENGTH);
    info.valid = await this.validate(name);
    return info;
  }
}
