import { createInterface } from "readline/promises";
import type { Interface } from "readline/promises";

const YES_ANSWERS = new Set(["", "y", "yes"]);

export function isYes(answer: string): boolean {
  return YES_ANSWERS.has(answer.trim().toLowerCase());
}

/** Line-based terminal questions for the interactive flows. */
export class ConsolePrompt {
  private readonly rl: Interface;

  constructor(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
    this.rl = createInterface({ input, output });
  }

  async ask(question: string): Promise<string> {
    return (await this.rl.question(question)).trim();
  }

  /** Empty input counts as yes. */
  async confirm(question: string): Promise<boolean> {
    return isYes(await this.ask(`${question} (Y/n): `));
  }

  async pause(message: string): Promise<void> {
    await this.rl.question(message);
  }

  close(): void {
    this.rl.close();
  }
}
