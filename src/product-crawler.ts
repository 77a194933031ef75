import type { PageFetcher } from "./core/fetcher";
import { ParseError } from "./core/errors";
import { createLogger, type Logger } from "./core/logger";
import { buildSearchUrl } from "./core/urls";
import { getErrorMessage, runPaced } from "./core/utils";
import { extractProduct } from "./product-extractor";
import type { ProductSink } from "./product-exporter";
import type {
  AcquisitionResult,
  Candidate,
  ProductCrawlResult,
  ProductRecord,
} from "./product-types";
import { extractSearchResults } from "./search-extractor";

export interface AcquireOptions {
  fetcher: PageFetcher;
  /** Site origin, e.g. https://www.amazon.com */
  baseUrl: string;
  /** Pause between two detail launches */
  delayMs: number;
  /** Max detail pages in flight; Infinity for pacing only */
  concurrency: number;
  sink?: ProductSink;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/**
 * Fetch a detail page and extract its record.
 * Never rejects: fetch and parse failures come back as `success: false`.
 */
export async function crawlProduct(
  candidate: Candidate,
  fetcher: PageFetcher
): Promise<ProductCrawlResult> {
  const { url, rank } = candidate;
  try {
    const html = await fetcher.fetch(url);
    let record: ProductRecord;
    try {
      record = extractProduct(html, url);
    } catch (err) {
      throw new ParseError(url, err);
    }
    return { success: true, rank, record };
  } catch (err) {
    return { success: false, rank, url, error: getErrorMessage(err) };
  }
}

/**
 * Search for `query`, then fetch and extract up to `count` products from the
 * results page. Individual failures only shrink the result.
 */
export async function acquireProducts(
  query: string,
  count: number,
  options: AcquireOptions
): Promise<AcquisitionResult> {
  const logger = options.logger ?? createLogger("acquire");
  const { fetcher } = options;
  const searchUrl = buildSearchUrl(options.baseUrl, query);

  const result: AcquisitionResult = {
    query,
    search_url: searchUrl,
    records: [],
    candidates: 0,
    skipped_without_snapshot: 0,
    attempted: 0,
    succeeded: 0,
    failures: [],
  };

  logger.info(`Searching top ${count} products for "${query}"`, {
    url: searchUrl,
    mode: fetcher.mode,
  });

  // ── Step 1: results page ──────────────────────────────────────────
  let urls: string[];
  try {
    const html = await fetcher.fetch(searchUrl);
    urls = extractSearchResults(html, count, options.baseUrl);
  } catch (err) {
    logger.error("Could not load search results page", {
      url: searchUrl,
      error: getErrorMessage(err),
    });
    return result;
  }
  result.candidates = urls.length;

  let candidates: Candidate[] = urls.map((url, rank) => ({ url, rank }));

  if (fetcher.mode !== "remote") {
    const withSnapshot = candidates.filter((c) => fetcher.snapshots.has(c.url));
    result.skipped_without_snapshot = candidates.length - withSnapshot.length;
    candidates = withSnapshot;
    if (result.skipped_without_snapshot > 0) {
      logger.info(
        `Local mode: using ${candidates.length} products with snapshots (skipping ${result.skipped_without_snapshot} without local files)`
      );
    }
  }

  result.attempted = candidates.length;
  logger.info(`Found ${candidates.length} products to process`);

  // ── Step 2: detail pages ──────────────────────────────────────────
  const crawled = await runPaced(
    candidates,
    {
      delayMs: options.delayMs,
      concurrency: options.concurrency,
      sleep: options.sleep,
    },
    (candidate) => crawlProduct(candidate, fetcher),
    (completed, total, candidate, outcome) => {
      if (outcome.success) {
        logger.info(`[${completed}/${total}] + ${outcome.record.title ?? "Unknown product"}`, {
          url: candidate.url,
        });
      } else {
        logger.warn(`[${completed}/${total}] x ${outcome.error}`, { url: candidate.url });
      }
    }
  );

  const successes: Array<{ rank: number; record: ProductRecord }> = [];
  for (const outcome of crawled) {
    if (outcome.success) successes.push(outcome);
    else result.failures.push({ url: outcome.url, error: outcome.error });
  }
  successes.sort((a, b) => a.rank - b.rank);

  result.records = successes.map((s) => s.record);
  result.succeeded = result.records.length;

  // ── Step 3: hand off ──────────────────────────────────────────────
  if (options.sink) {
    try {
      await options.sink.write(result.records);
    } catch (err) {
      logger.error("Sink failed to store records", { error: getErrorMessage(err) });
    }
  }

  logger.info(
    `Scraping complete: extracted ${result.succeeded}/${result.attempted} products`
  );
  return result;
}
