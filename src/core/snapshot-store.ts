import * as fs from "fs";
import * as path from "path";
import { identifierFromUrl, searchQueryFromUrl } from "./urls";

/**
 * Rendered pages kept on disk, one file per URL:
 *   search pages  → search_<query-slug>.html
 *   detail pages  → product_<identifier>.html
 */
export class SnapshotStore {
  constructor(readonly dir: string) {}

  /** Deterministic file path for a URL, or null when the URL has no known shape. */
  pathFor(url: string): string | null {
    const query = searchQueryFromUrl(url);
    if (query !== null) {
      return path.join(this.dir, `search_${slugify(query)}.html`);
    }
    const identifier = identifierFromUrl(url);
    if (identifier !== null) {
      return path.join(this.dir, `product_${identifier}.html`);
    }
    return null;
  }

  has(url: string): boolean {
    const filePath = this.pathFor(url);
    return filePath !== null && fs.existsSync(filePath);
  }

  /** Snapshot content, or null when there is no file for the URL. */
  load(url: string): string | null {
    const filePath = this.pathFor(url);
    if (filePath === null || !fs.existsSync(filePath)) return null;
    return fs.readFileSync(filePath, "utf-8");
  }

  /**
   * Write a snapshot. The directory is created if absent, so concurrent
   * savers never race on it.
   * @returns The written path, or null when the URL has no file name
   */
  save(url: string, html: string): string | null {
    const filePath = this.pathFor(url);
    if (filePath === null) return null;
    fs.mkdirSync(this.dir, { recursive: true });
    fs.writeFileSync(filePath, html, "utf-8");
    return filePath;
  }
}

function slugify(query: string): string {
  return query.trim().replace(/[^A-Za-z0-9_-]+/g, "_");
}
