import fs from "fs";
import path from "path";

/**
 * Reads KEY=value lines from a dotenv file into `process.env`. Variables that
 * are already set win. Returns the keys that were applied.
 */
export function loadDotEnv(
  filePath: string = path.resolve(process.cwd(), ".env"),
  env: NodeJS.ProcessEnv = process.env
): string[] {
  if (!fs.existsSync(filePath)) {
    return [];
  }

  return applyDotEnv(fs.readFileSync(filePath, "utf8"), env);
}

export function applyDotEnv(raw: string, env: NodeJS.ProcessEnv): string[] {
  const applied: string[] = [];

  for (const line of raw.split(/\r?\n/u)) {
    const trimmed = line.trim().replace(/^export\s+/u, "");
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }

    const equalsIndex = trimmed.indexOf("=");
    if (equalsIndex <= 0) {
      continue;
    }

    const key = trimmed.slice(0, equalsIndex).trim();
    if (!key || env[key] !== undefined) {
      continue;
    }

    env[key] = parseValue(trimmed.slice(equalsIndex + 1).trim());
    applied.push(key);
  }

  return applied;
}

function parseValue(value: string): string {
  const quote = value.charAt(0);
  if ((quote === "\"" || quote === "'") && value.length >= 2) {
    const closing = value.indexOf(quote, 1);
    if (closing > 0) {
      return value.slice(1, closing);
    }
  }

  // Unquoted values may carry a trailing comment.
  return value.replace(/\s+#.*$/u, "");
}
