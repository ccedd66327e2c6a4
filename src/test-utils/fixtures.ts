import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { MEMORY_PATH, openHistoryStore } from "../db";
import type { HistoryStore } from "../db";
import type { AppConfig, FeedConfig } from "../config";
import { NO_AUTH } from "../config";

/**
 * Creates an in-memory history store with the schema initialised.
 * @param now - Optional clock, for tests that care about timestamps.
 */
export function createTestHistory(now?: () => Date): HistoryStore {
  return openHistoryStore(MEMORY_PATH, now);
}

/**
 * Creates a resolved feed writing into `outputDir`, with optional overrides.
 */
export function createTestFeed(
  outputDir: string,
  overrides?: Partial<FeedConfig>,
): FeedConfig {
  return {
    name: "Test Feed",
    url: "https://example.com/feed.xml",
    outputDir,
    auth: NO_AUTH,
    whitelist: [],
    ...overrides,
  };
}

/**
 * Creates a default AppConfig suitable for testing.
 */
export function createTestConfig(overrides?: Partial<AppConfig>): AppConfig {
  return {
    http: { timeoutMs: 1000, userAgent: "PodFetch/test", atomicDownloads: true },
    feeds: {},
    notifiers: {},
    ...overrides,
  };
}

/**
 * Makes a fresh directory under the OS temp dir.
 * @returns The directory path and a cleanup function.
 */
export function createTempDir(): { readonly dir: string; readonly cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), "podfetch-test-"));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

export type TestItem = {
  readonly title: string;
  readonly enclosureUrl?: string;
  readonly enclosureType?: string;
};

/**
 * Renders a minimal RSS 2.0 document, items in the given (newest-first) order.
 */
export function rssDocument(items: ReadonlyArray<TestItem>): string {
  const body = items
    .map((item) => {
      const enclosure = item.enclosureUrl
        ? `<enclosure url="${item.enclosureUrl}" length="0" type="${item.enclosureType ?? "audio/mpeg"}"/>`
        : "";
      return `<item><title>${item.title}</title><link>https://example.com/posts</link>${enclosure}</item>`;
    })
    .join("");

  return `<?xml version="1.0" encoding="UTF-8"?><rss version="2.0"><channel><title>Test</title><link>https://example.com</link><description>Test feed</description>${body}</channel></rss>`;
}
