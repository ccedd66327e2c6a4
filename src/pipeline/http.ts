import type { FeedAuth, HttpSettings } from "../config";
import { FetchError } from "../errors";

/**
 * Applies feed auth to an outgoing request: query-string params are merged
 * into the URL, basic credentials become an Authorization header.
 */
export function buildRequest(
  url: string,
  auth: FeedAuth,
  userAgent: string,
): { readonly url: string; readonly headers: Record<string, string> } {
  const headers: Record<string, string> = { "User-Agent": userAgent };

  switch (auth.kind) {
    case "none":
      return { url, headers };
    case "basic": {
      const token = Buffer.from(`${auth.username}:${auth.password}`).toString(
        "base64",
      );
      headers["Authorization"] = `Basic ${token}`;
      return { url, headers };
    }
    case "query": {
      const target = new URL(url);
      for (const [key, value] of Object.entries(auth.params)) {
        target.searchParams.set(key, value);
      }
      return { url: target.toString(), headers };
    }
  }
}

/**
 * Performs a GET with the configured user agent and auth. The timeout covers
 * the wait for response headers only, so long enclosure bodies can stream
 * for as long as they need; `signal` likewise only cancels the request until
 * headers arrive. Network failures and non-2xx responses both become
 * FetchError.
 */
export async function httpGet(
  url: string,
  auth: FeedAuth,
  http: Pick<HttpSettings, "timeoutMs" | "userAgent">,
  signal?: AbortSignal,
): Promise<Response> {
  const request = buildRequest(url, auth, http.userAgent);

  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new Error(`no response after ${http.timeoutMs}ms`));
  }, http.timeoutMs);
  const forwardAbort = () => controller.abort(signal?.reason);
  if (signal?.aborted) {
    forwardAbort();
  } else {
    signal?.addEventListener("abort", forwardAbort, { once: true });
  }

  let response: Response;
  try {
    response = await fetch(request.url, {
      signal: controller.signal,
      headers: request.headers,
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new FetchError(`request failed: ${message}`, url);
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", forwardAbort);
  }

  if (!response.ok) {
    // Release the connection; the error body is never read.
    await response.body?.cancel();
    throw new FetchError(
      `HTTP ${response.status}: ${response.statusText}`,
      url,
      response.status,
    );
  }

  return response;
}
