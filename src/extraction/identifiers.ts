/** New-style arXiv id: four digits, a dot, five digits (e.g. 2401.00001). */
export const ARXIV_ID_PATTERN = /\d{4}\.\d{5}/;

/**
 * Derive the deduplication key for a reference URL: the first match of
 * `pattern`, falling back to the last non-empty path segment.
 */
export function deriveIdentifier(url: string, pattern: RegExp = ARXIV_ID_PATTERN): string {
  const match = url.match(withoutGlobalFlag(pattern));
  if (match) {
    return match[0];
  }
  const pathPart = url.split(/[?#]/)[0];
  const segments = pathPart.split("/").filter((segment) => segment.length > 0);
  return segments[segments.length - 1] ?? url;
}

/** A /g pattern makes match() drop capture groups and exec() stateful. */
export function withoutGlobalFlag(pattern: RegExp): RegExp {
  if (!pattern.global && !pattern.sticky) {
    return pattern;
  }
  return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ""));
}
