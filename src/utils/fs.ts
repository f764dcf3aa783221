import { promises as fs } from "fs";
import path from "path";

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export function pathExists(filePath: string): Promise<boolean> {
  return fs.access(filePath).then(
    () => true,
    () => false
  );
}

export async function readText(filePath: string): Promise<string> {
  return fs.readFile(filePath, "utf8");
}

/** Replace `filePath`, creating its directory first. */
async function replaceFile(filePath: string, data: string | Buffer): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, data);
}

export function writeJson(filePath: string, data: unknown): Promise<void> {
  return replaceFile(filePath, `${JSON.stringify(data, null, 2)}\n`);
}

export function writeBinary(filePath: string, data: Buffer): Promise<void> {
  return replaceFile(filePath, data);
}
