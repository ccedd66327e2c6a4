export type FeedLink = {
  readonly rel: string;
  readonly href: string;
  readonly type: string;
};

export type FeedEntry = {
  readonly title: string;
  readonly links: ReadonlyArray<FeedLink>;
};

export type SkipReason =
  | "empty-title"
  | "whitelist"
  | "history"
  | "no-enclosure"
  | "exists";

export type ItemOutcome =
  | { readonly status: "downloaded"; readonly title: string; readonly path: string }
  | { readonly status: "skipped"; readonly title: string; readonly reason: SkipReason }
  | { readonly status: "failed"; readonly title: string; readonly error: string };

export type DownloadEvent = {
  readonly feedName: string;
  readonly title: string;
};

export type FeedRunResult = {
  readonly feedName: string;
  readonly downloaded: number;
  readonly skipped: number;
  readonly failed: number;
  readonly error: string | null;
};

/**
 * Called as body bytes arrive. `totalBytes` is null when the server sent no
 * usable content-length.
 */
export type ProgressCallback = (
  receivedBytes: number,
  totalBytes: number | null,
) => void;
