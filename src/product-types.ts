/**
 * One product, as read from a rendered detail page.
 * Every field is optional: an absent field is a normal outcome.
 */
export interface ProductRecord {
  readonly identifier?: string;
  readonly title?: string;
  readonly brand?: string;
  readonly price?: string;
  readonly rating?: string;
  readonly review_count?: string;
  readonly bullet_features?: readonly string[];
  readonly breadcrumbs?: readonly string[];
  readonly dimensions?: string;
  readonly weight?: string;
  readonly image_url?: string;
  readonly source_url?: string;
}

/** A detail-page URL taken from the results page, with its position there */
export interface Candidate {
  url: string;
  rank: number;
}

export type ProductCrawlResult =
  | { success: true; rank: number; record: ProductRecord }
  | { success: false; rank: number; url: string; error: string };

export interface AcquisitionResult {
  query: string;
  search_url: string;
  /** Records of the successful detail pages, in results-page order */
  records: ProductRecord[];
  candidates: number;
  skipped_without_snapshot: number;
  attempted: number;
  succeeded: number;
  failures: Array<{ url: string; error: string }>;
}
