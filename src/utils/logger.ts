import { appendFileSync, existsSync, mkdirSync, renameSync, rmSync, statSync } from "fs";
import path from "path";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

const DEFAULT_MAX_BYTES = 10 * 1024 * 1024;
const DEFAULT_RETENTION = 7;

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
  /** Lines are appended here as well as printed. */
  filePath?: string | null;
  /** Size at which the file moves to `<file>.1` and a new one starts. */
  maxBytes?: number;
  /** Number of rotated files kept; older ones are deleted. */
  retention?: number;
}

function formatMeta(meta: unknown): string {
  if (meta === undefined) return "";
  if (meta instanceof Error) return ` ${meta.name}: ${meta.message}`;
  try {
    return ` ${JSON.stringify(meta)}`;
  } catch {
    return ` ${String(meta)}`;
  }
}

function timestamp(): string {
  return new Date().toISOString().replace("T", " ").replace(/\.\d{3}Z$/, "");
}

export class Logger {
  private readonly level: LogLevel;
  private readonly scope: string;
  private readonly filePath: string | null;
  private readonly maxBytes: number;
  private readonly retention: number;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.scope = options.scope ?? "stock-relay";
    this.filePath = options.filePath ?? null;
    this.maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;
    this.retention = options.retention ?? DEFAULT_RETENTION;
    if (this.filePath) {
      mkdirSync(path.dirname(this.filePath), { recursive: true });
    }
  }

  private should(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private rotate(filePath: string): void {
    if (this.retention === 0) {
      rmSync(filePath, { force: true });
      return;
    }
    rmSync(`${filePath}.${this.retention}`, { force: true });
    for (let index = this.retention - 1; index >= 1; index -= 1) {
      const from = `${filePath}.${index}`;
      if (existsSync(from)) renameSync(from, `${filePath}.${index + 1}`);
    }
    renameSync(filePath, `${filePath}.1`);
  }

  private append(filePath: string, line: string): void {
    if (existsSync(filePath) && statSync(filePath).size + Buffer.byteLength(line) > this.maxBytes) {
      this.rotate(filePath);
    }
    appendFileSync(filePath, line, "utf8");
  }

  private write(level: Exclude<LogLevel, "silent">, message: string, meta?: unknown): void {
    if (!this.should(level)) return;
    const line = `${timestamp()} | ${level.toUpperCase().padEnd(5)} | ${this.scope} | ${message}${formatMeta(meta)}`;
    if (level === "warn" || level === "error") {
      console.error(line);
    } else {
      console.log(line);
    }
    if (this.filePath) {
      this.append(this.filePath, line + "\n");
    }
  }

  debug(message: string, meta?: unknown): void {
    this.write("debug", message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write("info", message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write("warn", message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write("error", message, meta);
  }

  child(scope: string): Logger {
    return new Logger({
      level: this.level,
      scope,
      filePath: this.filePath,
      maxBytes: this.maxBytes,
      retention: this.retention
    });
  }
}

export function silentLogger(): Logger {
  return new Logger({ level: "silent" });
}
