// pattern: Imperative Shell
import type { Logger } from "pino";
import { resolveFeedConfig } from "./config";
import type { AppConfig } from "./config";
import type { HistoryStore } from "./db";
import { ConfigError, FetchError, ParseError, errorMessage } from "./errors";
import { notifyAll } from "./notify";
import type { Notifier } from "./notify";
import { downloadEnclosure, fetchFeed, processFeed } from "./pipeline";
import type { DownloadProgress, FeedRunResult } from "./pipeline";

export type RunDeps = {
  readonly config: AppConfig;
  readonly history: HistoryStore;
  readonly notifiers: ReadonlyArray<Notifier>;
  readonly logger: Logger;
  readonly progress?: DownloadProgress;
  readonly fetchEntries?: typeof fetchFeed;
  readonly download?: typeof downloadEnclosure;
  readonly signal?: AbortSignal;
};

export type RunSummary = {
  readonly feeds: ReadonlyArray<FeedRunResult>;
  readonly downloaded: number;
  readonly failed: number;
};

function feedFailure(feedName: string, error: string): FeedRunResult {
  return { feedName, downloaded: 0, skipped: 0, failed: 0, error };
}

/**
 * Processes every configured feed once, in configuration order.
 *
 * A feed that cannot be configured, fetched or parsed is logged and skipped;
 * the remaining feeds still run. Each finished download is passed to all
 * notifiers before the next entry is considered. Aborting `deps.signal`
 * cancels the download in progress and ends the run after it.
 */
export async function runOnce(deps: RunDeps): Promise<RunSummary> {
  const { config, history, notifiers, logger } = deps;
  const fetchEntries = deps.fetchEntries ?? fetchFeed;
  const results: Array<FeedRunResult> = [];

  for (const [feedName, rawFeed] of Object.entries(config.feeds)) {
    if (deps.signal?.aborted) {
      logger.info({ feedName }, "run cancelled, leaving remaining feeds");
      break;
    }
    logger.info({ feedName }, "processing feed");

    try {
      const feed = resolveFeedConfig(feedName, rawFeed);
      logger.debug(
        {
          feedName,
          outputDir: feed.outputDir,
          auth: feed.auth.kind,
          whitelistPatterns: feed.whitelist.length,
        },
        "feed configured",
      );

      const entries = await fetchEntries(
        feed.url,
        feed.auth,
        config.http,
        logger,
        deps.signal,
      );
      logger.debug({ feedName, entryCount: entries.length }, "found items");

      const result = await processFeed(feed, entries, {
        history,
        http: config.http,
        logger,
        download: deps.download,
        progress: deps.progress,
        onDownloaded: (event) => notifyAll(notifiers, event, logger),
        signal: deps.signal,
      });

      logger.info(
        { feedName, downloaded: result.downloaded, failed: result.failed },
        `downloaded ${result.downloaded} items`,
      );
      results.push(result);
    } catch (err) {
      const message = errorMessage(err);
      if (err instanceof ConfigError) {
        logger.error({ feedName, error: message }, "unable to load feed");
      } else if (err instanceof FetchError || err instanceof ParseError) {
        logger.error(
          { feedName, url: err.url, error: message },
          "unable to read feed, skipping",
        );
      } else {
        logger.error(
          { feedName, error: message },
          "unexpected error during feed processing",
        );
      }
      results.push(feedFailure(feedName, message));
    }
  }

  return {
    feeds: results,
    downloaded: results.reduce((sum, r) => sum + r.downloaded, 0),
    failed: results.reduce((sum, r) => sum + r.failed, 0),
  };
}
