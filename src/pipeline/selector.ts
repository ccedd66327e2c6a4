import { extname, join } from "node:path";
import type { FeedLink } from "./types";

const FALLBACK_EXTENSION = "bin";

/**
 * True when the whitelist is empty or at least one pattern matches the
 * title from its first character.
 */
export function matchesWhitelist(
  title: string,
  whitelist: ReadonlyArray<RegExp>,
): boolean {
  if (whitelist.length === 0) return true;
  return whitelist.some((pattern) => pattern.test(title));
}

/**
 * First link with relation "enclosure" and a non-empty href, in feed order.
 */
export function selectEnclosure(
  links: ReadonlyArray<FeedLink>,
): FeedLink | null {
  return links.find((link) => link.rel === "enclosure" && link.href !== "") ?? null;
}

/**
 * Extension for a downloaded enclosure: the mime subtype ("audio/mpeg" gives
 * "mpeg"), else the extension of the URL path, else "bin".
 */
export function enclosureExtension(link: FeedLink): string {
  const mime = link.type.split(";")[0]?.trim() ?? "";
  const subtype = mime.split("/").at(-1) ?? "";
  if (subtype !== "") return subtype;

  let pathname: string;
  try {
    pathname = new URL(link.href).pathname;
  } catch {
    pathname = link.href;
  }
  const ext = extname(pathname).slice(1);
  return ext !== "" ? ext : FALLBACK_EXTENSION;
}

export function outputPathFor(
  outputDir: string,
  sanitizedTitle: string,
  link: FeedLink,
): string {
  return join(outputDir, `${sanitizedTitle}.${enclosureExtension(link)}`);
}
