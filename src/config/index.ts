import { readFileSync } from "node:fs";
import { parse } from "yaml";
import { appConfigSchema } from "./schema";
import type { AppConfig, HttpSettings } from "./schema";
import { formatIssues } from "./feeds";

export function loadConfig(configPath: string): AppConfig {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to read config file at ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to parse YAML in ${configPath}: ${message}`);
  }

  const result = appConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(
      `invalid configuration in ${configPath}:\n${formatIssues(result.error)}`,
    );
  }

  return result.data;
}

export { resolveFeedConfig, NO_AUTH } from "./feeds";
export type { FeedAuth, FeedConfig } from "./feeds";
export { expandHome, DEFAULT_CONFIG_FILE, DEFAULT_HISTORY_FILE } from "./paths";
export type { AppConfig, HttpSettings };
