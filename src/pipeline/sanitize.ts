/**
 * Reduces a title to something safe to use as a file name: ASCII letters,
 * digits, hyphens and single spaces, with no surrounding whitespace.
 */
export function sanitizeTitle(value: string): string {
  return value
    .normalize("NFKD")
    .replace(/[^\x00-\x7f]/g, "")
    .replace(/[^A-Za-z0-9\s-]/g, "")
    .replace(/\s+/g, " ")
    .trim();
}
