import { existsSync } from "node:fs";
import type { Logger } from "pino";
import type { FeedConfig, HttpSettings } from "../config";
import type { HistoryStore } from "../db";
import { errorMessage } from "../errors";
import { downloadEnclosure } from "./downloader";
import { sanitizeTitle } from "./sanitize";
import { matchesWhitelist, outputPathFor, selectEnclosure } from "./selector";
import type {
  DownloadEvent,
  FeedEntry,
  FeedRunResult,
  ItemOutcome,
  ProgressCallback,
} from "./types";

/**
 * Terminal-side view of a single download. Implementations must not throw.
 */
export type DownloadProgress = {
  readonly start: (title: string) => void;
  readonly update: ProgressCallback;
  readonly finish: (succeeded: boolean) => void;
};

export type ProcessorDeps = {
  readonly history: HistoryStore;
  readonly http: HttpSettings;
  readonly logger: Logger;
  readonly download?: typeof downloadEnclosure;
  readonly progress?: DownloadProgress;
  readonly onDownloaded?: (event: DownloadEvent) => Promise<void>;
  // Aborting cancels the download in progress and stops the feed after it.
  readonly signal?: AbortSignal;
};

/**
 * Decides what to do with one entry and, when it is new and wanted,
 * downloads its enclosure. History is only written after the file is
 * complete, so a failed download is retried on the next run.
 */
export async function processEntry(
  feed: FeedConfig,
  entry: FeedEntry,
  deps: ProcessorDeps,
): Promise<ItemOutcome> {
  const { history, logger } = deps;
  const title = sanitizeTitle(entry.title);
  logger.debug({ feedName: feed.name, title }, "parsing item");

  if (title === "") {
    logger.warn(
      { feedName: feed.name, rawTitle: entry.title },
      "skipping item, title has no usable characters",
    );
    return { status: "skipped", title, reason: "empty-title" };
  }

  if (!matchesWhitelist(entry.title, feed.whitelist)) {
    logger.debug({ feedName: feed.name, title }, "skipping item, no whitelist matches");
    return { status: "skipped", title, reason: "whitelist" };
  }

  const downloadedAt = history.has(feed.name, entry.title);
  if (downloadedAt) {
    logger.debug(
      { feedName: feed.name, title, downloadedAt: downloadedAt.toISOString() },
      "skipping item, already in history",
    );
    return { status: "skipped", title, reason: "history" };
  }

  const enclosure = selectEnclosure(entry.links);
  if (!enclosure) {
    logger.warn({ feedName: feed.name, title }, "skipping item, no valid urls");
    return { status: "skipped", title, reason: "no-enclosure" };
  }
  logger.debug({ feedName: feed.name, url: enclosure.href }, "found enclosure");

  const path = outputPathFor(feed.outputDir, title, enclosure);
  if (existsSync(path)) {
    logger.debug({ feedName: feed.name, path }, "skipping item, output path exists");
    return { status: "skipped", title, reason: "exists" };
  }

  logger.info({ feedName: feed.name, title }, "downloading item");
  const download = deps.download ?? downloadEnclosure;
  deps.progress?.start(title);
  try {
    const bytes = await download(enclosure.href, feed.auth, path, {
      http: deps.http,
      onProgress: deps.progress?.update,
      signal: deps.signal,
    });
    deps.progress?.finish(true);
    logger.debug({ feedName: feed.name, path, bytes }, "download complete");
  } catch (err) {
    deps.progress?.finish(false);
    const message = errorMessage(err);
    logger.warn(
      { feedName: feed.name, title, url: enclosure.href, error: message },
      "skipping item, download failed",
    );
    return { status: "failed", title, error: message };
  }

  history.record(feed.name, enclosure.href, entry.title);
  logger.debug({ feedName: feed.name, title }, "added to history");

  return { status: "downloaded", title, path };
}

/**
 * Runs every entry of one feed through processEntry, oldest first, so that
 * older episodes land on disk before newer ones. Stops early once
 * `deps.signal` is aborted.
 */
export async function processFeed(
  feed: FeedConfig,
  entries: ReadonlyArray<FeedEntry>,
  deps: ProcessorDeps,
): Promise<FeedRunResult> {
  let downloaded = 0;
  let skipped = 0;
  let failed = 0;

  for (const entry of [...entries].reverse()) {
    if (deps.signal?.aborted) {
      deps.logger.info({ feedName: feed.name }, "run cancelled, leaving remaining items");
      break;
    }
    const outcome = await processEntry(feed, entry, deps);

    switch (outcome.status) {
      case "downloaded":
        downloaded++;
        if (deps.onDownloaded) {
          await deps.onDownloaded({ feedName: feed.name, title: outcome.title });
        }
        break;
      case "skipped":
        skipped++;
        break;
      case "failed":
        failed++;
        break;
    }
  }

  return { feedName: feed.name, downloaded, skipped, failed, error: null };
}
