import path from "node:path";
import dotenv from "dotenv";

export function readEnv(name: string): string | null {
  const value = process.env[name];
  if (!value) return null;
  return value.trim();
}

export function readBooleanEnv(name: string): boolean | null {
  const value = readEnv(name);
  if (value === null) return null;
  return ["1", "true", "yes", "on"].includes(value.toLowerCase());
}

export function readNumberEnv(name: string): number | null {
  const value = readEnv(name);
  if (value === null) return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
}

export function readListEnv(name: string): string[] | null {
  const value = readEnv(name);
  if (value === null) return null;
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
  return items.length ? items : null;
}

/**
 * Reads `<projectRoot>/.env` into `process.env` without overriding variables
 * that are already set. Returns the keys that were applied.
 */
export function loadDotEnv(projectRoot: string, fileName = ".env"): string[] {
  const alreadySet = new Set(Object.keys(process.env));
  const result = dotenv.config({ path: path.join(projectRoot, fileName), override: false });
  return Object.keys(result.parsed ?? {}).filter((key) => !alreadySet.has(key));
}
