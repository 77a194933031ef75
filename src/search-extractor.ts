import * as cheerio from "cheerio";
import { resolveHref } from "./core/urls";
import { SELECTORS } from "./selectors";

/**
 * Read candidate detail-page URLs from a rendered search-results page.
 * Looks at the first `limit` result containers in document order and takes
 * the first product link of each; containers without a usable link are skipped.
 * @param html - Rendered results page
 * @param limit - Max result containers to inspect
 * @param origin - Site origin used to resolve relative links
 * @returns Absolute URLs, in results-page order
 */
export function extractSearchResults(html: string, limit: number, origin: string): string[] {
  const $ = cheerio.load(html);
  const urls: string[] = [];

  $(SELECTORS.searchResult)
    .slice(0, Math.max(0, limit))
    .each((_, el) => {
      const href = $(el).find(SELECTORS.resultLink).first().attr("href");
      const url = resolveHref(href, origin);
      if (url) urls.push(url);
    });

  return urls;
}
