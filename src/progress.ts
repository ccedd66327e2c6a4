import ora from "ora";
import type { Ora } from "ora";
import type { DownloadProgress } from "./pipeline";

const UNITS = ["B", "KiB", "MiB", "GiB"] as const;

export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${UNITS[0]}` : `${value.toFixed(1)} ${UNITS[unit]}`;
}

export function formatProgress(
  title: string,
  receivedBytes: number,
  totalBytes: number | null,
): string {
  if (totalBytes === null || totalBytes === 0) {
    return `${title} ${formatBytes(receivedBytes)}`;
  }
  const percent = Math.min(100, Math.floor((receivedBytes / totalBytes) * 100));
  return `${title} ${percent}% of ${formatBytes(totalBytes)}`;
}

/**
 * Terminal spinner showing how far the current download has got.
 */
export function createSpinnerProgress(): DownloadProgress {
  let spinner: Ora | null = null;
  let title = "";

  return {
    start(next) {
      title = next;
      spinner = ora(title).start();
    },
    update(receivedBytes, totalBytes) {
      if (spinner) {
        spinner.text = formatProgress(title, receivedBytes, totalBytes);
      }
    },
    finish(succeeded) {
      if (succeeded) {
        spinner?.succeed(title);
      } else {
        spinner?.fail(title);
      }
      spinner = null;
    },
  };
}
