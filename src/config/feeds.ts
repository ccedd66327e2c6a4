import type { z } from "zod";
import { ConfigError } from "../errors";
import { feedConfigSchema } from "./schema";
import type { RawFeedConfig } from "./schema";
import { expandHome } from "./paths";

export type FeedAuth =
  | { readonly kind: "none" }
  | {
      readonly kind: "basic";
      readonly username: string;
      readonly password: string;
    }
  | { readonly kind: "query"; readonly params: Readonly<Record<string, string>> };

export const NO_AUTH: FeedAuth = { kind: "none" };

/**
 * A feed ready for processing. Built once per run from the configuration
 * and never mutated; each feed owns its auth and whitelist values.
 */
export type FeedConfig = {
  readonly name: string;
  readonly url: string;
  readonly outputDir: string;
  readonly auth: FeedAuth;
  readonly whitelist: ReadonlyArray<RegExp>;
};

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => `  - ${i.path.join(".") || "(root)"}: ${i.message}`)
    .join("\n");
}

export function parseFeedAuth(
  auth: RawFeedConfig["auth"],
  feedName: string,
): FeedAuth {
  if (auth === undefined) return NO_AUTH;

  if (typeof auth === "string") {
    const separator = auth.indexOf(":");
    if (separator < 0) {
      throw new ConfigError(
        `feed "${feedName}": basic auth must be written as "user:password"`,
        feedName,
      );
    }
    return {
      kind: "basic",
      username: auth.slice(0, separator),
      password: auth.slice(separator + 1),
    };
  }

  return { kind: "query", params: { ...auth } };
}

// Leading inline flag accepted for case-insensitive patterns, e.g. "(?i)episode".
const IGNORE_CASE_PREFIX = "(?i)";

/**
 * Compiles whitelist patterns so that each one only matches from the first
 * character of a title. A leading `(?i)` makes the pattern case-insensitive.
 * A pattern that is not a valid regular expression on its own is rejected
 * before anchoring.
 */
export function compileWhitelist(
  patterns: ReadonlyArray<string>,
  feedName: string,
): ReadonlyArray<RegExp> {
  return patterns.map((pattern) => {
    const ignoreCase = pattern.startsWith(IGNORE_CASE_PREFIX);
    const source = ignoreCase ? pattern.slice(IGNORE_CASE_PREFIX.length) : pattern;
    const flags = ignoreCase ? "i" : "";
    try {
      new RegExp(source, flags);
      return new RegExp(`^(?:${source})`, flags);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigError(
        `feed "${feedName}": invalid whitelist pattern ${JSON.stringify(pattern)}: ${message}`,
        feedName,
      );
    }
  });
}

export function resolveFeedConfig(name: string, raw: unknown): FeedConfig {
  const result = feedConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `invalid configuration for feed "${name}":\n${formatIssues(result.error)}`,
      name,
    );
  }

  const feed = result.data;
  return Object.freeze({
    name,
    url: feed.url,
    outputDir: expandHome(feed.output),
    auth: parseFeedAuth(feed.auth, name),
    whitelist: Object.freeze(compileWhitelist(feed.whitelist ?? [], name)),
  });
}
