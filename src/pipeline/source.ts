import Parser from "rss-parser";
import type { Logger } from "pino";
import { z } from "zod";
import type { FeedAuth, HttpSettings } from "../config";
import { ParseError } from "../errors";
import { httpGet } from "./http";
import type { FeedEntry, FeedLink } from "./types";

type CustomItem = {
  links?: unknown;
};

// Raw <link> elements as rss-parser hands them over: plain text for RSS,
// attribute bags for Atom.
const rawLinkSchema = z.union([
  z.string().transform((href): FeedLink => ({ rel: "alternate", href, type: "" })),
  z
    .object({
      $: z.object({
        rel: z.string().optional(),
        href: z.string().optional(),
        type: z.string().optional(),
      }),
    })
    .transform(
      ({ $ }): FeedLink => ({
        rel: $.rel ?? "alternate",
        href: $.href ?? "",
        type: $.type ?? "",
      }),
    ),
  z
    .object({ _: z.string() })
    .transform(({ _ }): FeedLink => ({ rel: "alternate", href: _, type: "" })),
]);

let parserInstance: Parser<Record<string, unknown>, CustomItem> | null = null;

export function createParser(): Parser<Record<string, unknown>, CustomItem> {
  return new Parser<Record<string, unknown>, CustomItem>({
    customFields: {
      item: [["link", "links", { keepArray: true }]],
    },
  });
}

function getParserInstance(): Parser<Record<string, unknown>, CustomItem> {
  if (!parserInstance) {
    parserInstance = createParser();
  }
  return parserInstance;
}

function toLinks(
  rawLinks: unknown,
  enclosure: Parser.Enclosure | undefined,
): ReadonlyArray<FeedLink> {
  const links: Array<FeedLink> = [];

  if (Array.isArray(rawLinks)) {
    for (const raw of rawLinks) {
      const parsed = rawLinkSchema.safeParse(raw);
      if (parsed.success) links.push(parsed.data);
    }
  }

  if (enclosure?.url) {
    links.push({
      rel: "enclosure",
      href: enclosure.url,
      type: enclosure.type ?? "",
    });
  }

  return links;
}

/**
 * Parses an RSS or Atom document into entries in document order.
 */
export async function parseFeed(
  xml: string,
  url: string,
): Promise<ReadonlyArray<FeedEntry>> {
  const feed = await getParserInstance()
    .parseString(xml)
    .catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      throw new ParseError(`unable to parse feed: ${message}`, url);
    });

  return feed.items.map((item) => ({
    title: item.title ?? "",
    links: toLinks(item.links, item.enclosure),
  }));
}

/**
 * Downloads and parses one feed index. Throws FetchError for transport or
 * HTTP failures and ParseError for bodies that are not a feed.
 */
export async function fetchFeed(
  url: string,
  auth: FeedAuth,
  http: Pick<HttpSettings, "timeoutMs" | "userAgent">,
  logger: Logger,
  signal?: AbortSignal,
): Promise<ReadonlyArray<FeedEntry>> {
  logger.debug({ url }, "fetching feed index");
  const response = await httpGet(url, auth, http, signal);
  const xml = await response.text();

  logger.debug({ url, bytes: xml.length }, "parsing feed");
  const entries = await parseFeed(xml, url);

  logger.debug({ url, entryCount: entries.length }, "feed parsed");
  return entries;
}
