/** Ten-character product code following /dp/ in a detail URL */
export const IDENTIFIER_PATTERN = /\/dp\/([A-Z0-9]{10})/;

const SEARCH_PATH = "/s";
const SEARCH_PARAM = "k";

export function buildSearchUrl(baseUrl: string, query: string): string {
  return `${baseUrl}${SEARCH_PATH}?${SEARCH_PARAM}=${encodeURIComponent(query)}`;
}

/** The product code embedded in a detail URL, or null. */
export function identifierFromUrl(url: string): string | null {
  const match = IDENTIFIER_PATTERN.exec(url);
  return match ? match[1] : null;
}

/** The decoded search query of a results URL, or null for any other URL. */
export function searchQueryFromUrl(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }
  if (parsed.pathname !== SEARCH_PATH) return null;
  const query = parsed.searchParams.get(SEARCH_PARAM);
  return query ? query : null;
}

/**
 * Resolve an href against the site origin.
 * Returns null for empty, malformed or non-http(s) links.
 */
export function resolveHref(href: string | undefined, origin: string): string | null {
  const trimmed = href?.trim() ?? "";
  if (!trimmed) return null;
  try {
    const resolved = new URL(trimmed, origin);
    if (resolved.protocol !== "http:" && resolved.protocol !== "https:") return null;
    return resolved.href;
  } catch {
    return null;
  }
}
