import * as fs from "fs";
import * as path from "path";
import type { ProductRecord } from "./product-types";

const BOM = "\uFEFF";

/** Receives the final records of a run and stores them somewhere durable. */
export interface ProductSink {
  write(records: readonly ProductRecord[]): Promise<void>;
}

export const CSV_COLUMNS = [
  "identifier",
  "title",
  "price",
  "rating",
  "review_count",
  "brand",
  "bullet_features",
  "breadcrumbs",
  "dimensions",
  "weight",
  "source_url",
  "image_url",
] as const satisfies ReadonlyArray<keyof ProductRecord>;

function escapeCsv(value: string | undefined): string {
  const str = value ?? "";
  if (
    str.includes('"') ||
    str.includes(",") ||
    str.includes("\n") ||
    str.includes("\r")
  ) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/** List columns are JSON-encoded so they survive a round trip through a spreadsheet. */
function csvCell(value: ProductRecord[keyof ProductRecord]): string {
  if (value === undefined) return "";
  if (typeof value === "string") return escapeCsv(value);
  return escapeCsv(JSON.stringify(value));
}

/**
 * One JSON object per line. Absent fields are omitted.
 */
export function exportProductsJsonl(
  records: readonly ProductRecord[],
  outputDir: string
): string {
  fs.mkdirSync(outputDir, { recursive: true });
  const filePath = path.join(outputDir, "products.jsonl");
  const body = records.map((r) => JSON.stringify(r)).join("\n");
  fs.writeFileSync(filePath, body ? body + "\n" : "", "utf-8");
  return filePath;
}

/**
 * Flat CSV, one row per product, fixed column order.
 */
export function exportProductsCsv(
  records: readonly ProductRecord[],
  outputDir: string
): string {
  fs.mkdirSync(outputDir, { recursive: true });
  const filePath = path.join(outputDir, "products.csv");

  const lines: string[] = [BOM + CSV_COLUMNS.join(",")];
  for (const record of records) {
    lines.push(CSV_COLUMNS.map((col) => csvCell(record[col])).join(","));
  }

  fs.writeFileSync(filePath, lines.join("\n") + "\n", "utf-8");
  return filePath;
}

/** Writes products.jsonl and products.csv into one directory. */
export class FileProductSink implements ProductSink {
  readonly written: string[] = [];

  constructor(private readonly outputDir: string) {}

  async write(records: readonly ProductRecord[]): Promise<void> {
    this.written.push(
      exportProductsJsonl(records, this.outputDir),
      exportProductsCsv(records, this.outputDir)
    );
  }
}
