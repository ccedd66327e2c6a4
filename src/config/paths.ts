import { homedir } from "node:os";
import { join } from "node:path";

export const DEFAULT_CONFIG_FILE = "~/.podfetch.yaml";
export const DEFAULT_HISTORY_FILE = "~/.podfetch.db";

/**
 * Expands a leading `~` to the current user's home directory.
 */
export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}
