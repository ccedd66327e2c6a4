export { fetchFeed, parseFeed } from "./source";
export { downloadEnclosure } from "./downloader";
export { processEntry, processFeed } from "./processor";
export { sanitizeTitle } from "./sanitize";
export { matchesWhitelist, selectEnclosure, outputPathFor } from "./selector";
export type { DownloadProgress, ProcessorDeps } from "./processor";
export type {
  DownloadEvent,
  FeedEntry,
  FeedLink,
  FeedRunResult,
  ItemOutcome,
  ProgressCallback,
  SkipReason,
} from "./types";
