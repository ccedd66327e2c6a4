import { mkdir, open, rename, rm } from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import type { ReadableStream } from "node:stream/web";
import type { FeedAuth, HttpSettings } from "../config";
import { FetchError } from "../errors";
import { httpGet } from "./http";
import type { ProgressCallback } from "./types";

export const CHUNK_SIZE = 10 * 1024;

// Longest file name (in bytes) accepted by common filesystems.
export const NAME_MAX = 255;

const PART_SUFFIX = ".part";

export type DownloadOptions = {
  readonly http: HttpSettings;
  readonly onProgress?: ProgressCallback;
  readonly signal?: AbortSignal;
};

export function parseContentLength(value: string | null): number | null {
  if (value === null) return null;
  const length = parseInt(value, 10);
  return Number.isNaN(length) || length < 0 ? null : length;
}

/**
 * Where an atomic download is written before it is renamed into place. The
 * name is cut short when `<name>.part` would not fit in NAME_MAX bytes.
 */
export function partPathFor(destination: string): string {
  const name = Buffer.from(basename(destination));
  const room = NAME_MAX - PART_SUFFIX.length;
  const stem =
    name.length > room ? name.subarray(0, room).toString() : name.toString();
  return join(dirname(destination), `${stem}${PART_SUFFIX}`);
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error
    ? signal.reason
    : new Error("download cancelled");
}

/**
 * Re-slices a byte stream into chunks of exactly `size` bytes; only the last
 * chunk may be shorter. Aborting `signal` cancels the stream and makes the
 * generator throw the abort reason.
 */
export async function* rechunk(
  stream: ReadableStream<Uint8Array>,
  size: number,
  signal?: AbortSignal,
): AsyncGenerator<Buffer> {
  const reader = stream.getReader();
  const cancel = () => {
    reader.cancel(signal?.reason).catch(() => undefined);
  };
  signal?.addEventListener("abort", cancel, { once: true });
  let buffered = Buffer.alloc(0);

  try {
    while (true) {
      if (signal?.aborted) throw abortReason(signal);
      const { done, value } = await reader.read();
      if (signal?.aborted) throw abortReason(signal);
      if (done) break;

      buffered = Buffer.concat([buffered, value]);
      while (buffered.length >= size) {
        yield buffered.subarray(0, size);
        buffered = buffered.subarray(size);
      }
    }
  } finally {
    signal?.removeEventListener("abort", cancel);
  }

  if (buffered.length > 0) yield buffered;
}

/**
 * Streams `url` into `destination` and returns the number of bytes written.
 *
 * With `atomicDownloads` the body goes to a `.part` file beside the
 * destination, which is renamed into place on success and removed on failure
 * or cancellation. Without it the body is written straight to `destination`,
 * and an interrupted transfer leaves a truncated file there.
 */
export async function downloadEnclosure(
  url: string,
  auth: FeedAuth,
  destination: string,
  options: DownloadOptions,
): Promise<number> {
  const response = await httpGet(url, auth, options.http, options.signal);
  const totalBytes = parseContentLength(response.headers.get("content-length"));

  const target = options.http.atomicDownloads
    ? partPathFor(destination)
    : destination;

  let handle: FileHandle;
  try {
    await mkdir(dirname(destination), { recursive: true });
    handle = await open(target, "w");
  } catch (err) {
    await response.body?.cancel();
    throw err;
  }
  let receivedBytes = 0;

  try {
    if (response.body) {
      try {
        for await (const chunk of rechunk(response.body, CHUNK_SIZE, options.signal)) {
          await handle.write(chunk);
          receivedBytes += chunk.length;
          options.onProgress?.(receivedBytes, totalBytes);
        }
      } catch (err) {
        if (err instanceof FetchError) throw err;
        const message = err instanceof Error ? err.message : String(err);
        throw new FetchError(`download interrupted: ${message}`, url);
      }
    }
    await handle.close();
  } catch (err) {
    await handle.close().catch(() => undefined);
    if (options.http.atomicDownloads) {
      await rm(target, { force: true });
    }
    throw err;
  }

  if (options.http.atomicDownloads) {
    await rename(target, destination);
  }

  return receivedBytes;
}
