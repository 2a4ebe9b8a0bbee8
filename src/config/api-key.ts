/**
 * 2Captcha API Key Resolution
 *
 * The key may come from the process environment or from a dotenv-style
 * file. The first match in a fixed search order wins; nothing is required.
 */
import fs from "fs";
import path from "path";
import dotenv from "dotenv";

/** Variable names accepted for the key, in lookup order */
export const API_KEY_VARIABLES = ["TWO_CAPTCHA_API_KEY", "2CAPTCHA_API_KEY"] as const;

export interface ApiKeySources {
  env: NodeJS.ProcessEnv;
  /** .env files to read, in order */
  envFiles: string[];
  readFile?: (filePath: string) => string | null;
}

function readIfPresent(filePath: string): string | null {
  if (!fs.existsSync(filePath)) return null;
  return fs.readFileSync(filePath, "utf8");
}

function pickKey(values: Record<string, string | undefined>): string | null {
  for (const name of API_KEY_VARIABLES) {
    const value = values[name]?.trim();
    if (value) return value;
  }
  return null;
}

/**
 * Default .env search order: working directory, its parent, then the
 * package root.
 */
export function defaultEnvFiles(cwd: string = process.cwd()): string[] {
  return [
    path.join(cwd, ".env"),
    path.join(path.dirname(cwd), ".env"),
    path.resolve(__dirname, "..", "..", ".env"),
  ];
}

export function resolveApiKey(sources: ApiKeySources): string | null {
  const fromEnv = pickKey(sources.env);
  if (fromEnv) return fromEnv;

  const readFile = sources.readFile ?? readIfPresent;
  for (const file of sources.envFiles) {
    const content = readFile(file);
    if (content === null) continue;
    const fromFile = pickKey(dotenv.parse(content));
    if (fromFile) return fromFile;
  }
  return null;
}
