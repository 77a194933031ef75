import * as cheerio from "cheerio";
import type { ProductRecord } from "./product-types";
import { identifierFromUrl } from "./core/urls";
import { DIMENSION_LABEL, SELECTORS, WEIGHT_LABEL, WEIGHT_UNIT } from "./selectors";

/** One way of reading a field; undefined means "try the next one". */
type Strategy = ($: cheerio.CheerioAPI) => string | undefined;

const BIDI_MARKS = /[\u200e\u200f\u202a-\u202e\u2066-\u2069]/g;

/**
 * Strip bidirectional marks, collapse whitespace, trim.
 * Empty results become undefined.
 */
export function cleanText(text: string | undefined | null): string | undefined {
  if (!text) return undefined;
  const cleaned = text.replace(BIDI_MARKS, "").replace(/\s+/g, " ").trim();
  return cleaned || undefined;
}

function text(selector: string): Strategy {
  return ($) => cleanText($(selector).first().text());
}

function attr(selector: string, name: string): Strategy {
  return ($) => cleanText($(selector).first().attr(name));
}

function firstOf($: cheerio.CheerioAPI, strategies: readonly Strategy[]): string | undefined {
  for (const strategy of strategies) {
    const value = strategy($);
    if (value !== undefined) return value;
  }
  return undefined;
}

// ── Field chains ───────────────────────────────────────────────────

const TITLE: Strategy[] = [
  text(SELECTORS.title[0]),
  text(SELECTORS.title[1]),
  attr(SELECTORS.title[2], "content"),
];
const PRICE: Strategy[] = SELECTORS.price.map(text);
const RATING: Strategy[] = SELECTORS.rating.map(text);
const REVIEW_COUNT: Strategy[] = SELECTORS.reviewCount.map(text);
const BRAND: Strategy[] = SELECTORS.brand.map(text);
const IMAGE: Strategy[] = SELECTORS.image.flatMap((sel) => [
  attr(sel, "src"),
  attr(sel, "data-old-hires"),
]);

/**
 * Drop a leading "Brand:" label and the "Visit the … Store" link wording.
 */
export function cleanBrand(raw: string | undefined): string | undefined {
  if (raw === undefined) return undefined;
  const brand = raw
    .replace(/^Brand:\s*/i, "")
    .replace(/^Visit the\s+/i, "")
    .replace(/\s+Store$/i, "")
    .trim();
  return brand || undefined;
}

/**
 * Product code: the /dp/ segment of the URL first, then the hidden form input.
 */
export function extractIdentifier($: cheerio.CheerioAPI, url: string): string | undefined {
  return firstOf($, [
    () => identifierFromUrl(url) ?? undefined,
    attr(SELECTORS.identifierInput, "value"),
  ]);
}

function listTexts($: cheerio.CheerioAPI, selector: string): string[] {
  const items: string[] = [];
  $(selector).each((_, el) => {
    const value = cleanText($(el).text());
    if (value) items.push(value);
  });
  return items;
}

// ── Dimensions / weight ────────────────────────────────────────────

export interface DetailValues {
  dimensions?: string;
  weight?: string;
}

/**
 * Split dimension and weight values out of detail rows, scanned in order.
 *
 * A dimension row ("dimension" or "size") sets dimensions once. If one of its
 * ";" clauses carries a weight unit, that clause is the weight and it
 * replaces any weight already found. A weight row only fills an empty weight.
 */
export function disambiguateDetailRows(rows: Iterable<string>): DetailValues {
  let dimensions: string | undefined;
  let weight: string | undefined;

  for (const row of rows) {
    const lower = row.toLowerCase();

    if (lower.includes("dimension") || lower.includes("size")) {
      const value = row.replace(DIMENSION_LABEL, "").trim();
      const [head, ...clauses] = value.split(";");
      const weightClause = clauses.map((c) => c.trim()).find((c) => WEIGHT_UNIT.test(c));

      if (weightClause !== undefined) {
        weight = weightClause;
        dimensions ??= cleanText(head);
      } else {
        dimensions ??= cleanText(value);
      }
    }

    if (lower.includes("weight") && weight === undefined) {
      weight = cleanText(row.replace(WEIGHT_LABEL, ""));
    }
  }

  return { dimensions, weight };
}

/** Normalized text of every detail row, containers in listed order, each element once. */
function detailRowTexts($: cheerio.CheerioAPI): string[] {
  const seen = new Set<unknown>();
  const rows: string[] = [];

  for (const containerSel of SELECTORS.detailContainers) {
    $(containerSel).each((_, container) => {
      if (seen.has(container)) return;
      seen.add(container);

      $(container)
        .find(SELECTORS.detailRows)
        .each((_, row) => {
          const $row = $(row);
          const cells = $row.children("th, td");
          const raw =
            cells.length > 0
              ? cells.map((_, cell) => $(cell).text()).get().join(" ")
              : $row.text();
          const value = cleanText(raw);
          if (value) rows.push(value);
        });
    });
  }

  return rows;
}

// ── Record ─────────────────────────────────────────────────────────

/**
 * Build a ProductRecord from a rendered detail page.
 * Missing fields stay undefined; this never fails for lack of data.
 */
export function extractProduct(html: string, sourceUrl: string): ProductRecord {
  const $ = cheerio.load(html);
  const details = disambiguateDetailRows(detailRowTexts($));

  const record: ProductRecord = {
    identifier: extractIdentifier($, sourceUrl),
    title: firstOf($, TITLE),
    brand: cleanBrand(firstOf($, BRAND)),
    price: firstOf($, PRICE),
    rating: firstOf($, RATING),
    review_count: firstOf($, REVIEW_COUNT),
    bullet_features: Object.freeze(listTexts($, SELECTORS.bullets)),
    breadcrumbs: Object.freeze(listTexts($, SELECTORS.breadcrumbs)),
    dimensions: details.dimensions,
    weight: details.weight,
    image_url: firstOf($, IMAGE),
    source_url: sourceUrl,
  };

  return Object.freeze(record);
}
