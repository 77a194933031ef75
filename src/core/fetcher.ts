import { createHash } from "crypto";
import type { AxiosInstance, AxiosResponse } from "axios";
import type { ScrapeSettings } from "./config";
import { ConfigurationError, FetchError } from "./errors";
import { createLogger, type Logger } from "./logger";
import type { SnapshotStore } from "./snapshot-store";
import { createRenderClient, getErrorMessage, sleep } from "./utils";

/** Status the rendering service returns when the target site banned the request */
export const BAN_STATUS = 520;

const SESSION_CONTEXT_NAME = "product_session";

/**
 * remote  - rendering service only
 * local   - snapshot first, rendering service on a miss
 * offline - snapshots only; a miss is a failure
 */
export type FetchMode = "remote" | "local" | "offline";

export interface FetcherOptions {
  mode: FetchMode;
  render: ScrapeSettings["render"];
  backoffBase: number;
  backoffMultiplier: number;
  snapshots: SnapshotStore;
  /** Write every remotely fetched page into the snapshot store */
  saveSnapshots?: boolean;
  http?: AxiosInstance;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

interface FetchAttempt {
  url: string;
  retryCount: number;
  outcome: "ok" | "banned" | "failed";
}

export interface RenderRequest {
  url: string;
  browserHtml: true;
  javascript: true;
  geolocation: string;
  device: string;
  sessionContext: Array<{ name: string; value: string }>;
  actions: Array<{ action: "waitForTimeout"; timeout: number }>;
}

/**
 * Deterministic session bucket for a URL, so repeated fetches of the same page
 * reuse the same rendering session.
 */
export function sessionIndex(url: string, modulus: number): number {
  return createHash("sha1").update(url).digest().readUInt32BE(0) % modulus;
}

/**
 * Gets rendered page content for one URL at a time. Knows nothing about products.
 */
export class PageFetcher {
  private readonly http: AxiosInstance;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(private readonly options: FetcherOptions) {
    if (options.mode !== "offline" && !options.render.apiKey) {
      throw new ConfigurationError(
        `RENDER_API_KEY is required in "${options.mode}" mode (use offline mode to read snapshots only)`
      );
    }
    this.http =
      options.http ?? createRenderClient(options.render.timeoutMs, options.render.apiKey);
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? createLogger("fetcher");
  }

  get mode(): FetchMode {
    return this.options.mode;
  }

  get snapshots(): SnapshotStore {
    return this.options.snapshots;
  }

  /**
   * Rendered content for a URL.
   * @throws FetchError for any failure; the caller decides what it means for the batch
   */
  async fetch(url: string): Promise<string> {
    const { mode } = this.options;

    if (mode !== "remote") {
      const local = this.loadSnapshot(url);
      if (local !== null) return local;
      if (mode === "offline") {
        throw new FetchError("local-file-missing", url, `No local snapshot for ${url}`);
      }
      this.logger.warn("No usable snapshot, falling back to rendering service", { url });
    }

    const html = await this.fetchRemote(url);
    if (this.options.saveSnapshots) this.saveSnapshot(url, html);
    return html;
  }

  buildRequest(url: string): RenderRequest {
    const { render } = this.options;
    return {
      url,
      browserHtml: true,
      javascript: true,
      geolocation: render.geolocation,
      device: render.device,
      sessionContext: [
        {
          name: SESSION_CONTEXT_NAME,
          value: `session_${sessionIndex(url, render.sessionHashMod)}`,
        },
      ],
      actions: [{ action: "waitForTimeout", timeout: render.waitSeconds }],
    };
  }

  private loadSnapshot(url: string): string | null {
    try {
      const html = this.options.snapshots.load(url);
      if (html === null) {
        this.logger.warn("Local snapshot not found", {
          url,
          file: this.options.snapshots.pathFor(url),
        });
        return null;
      }
      this.logger.info("Loaded page from local snapshot", { url });
      return html;
    } catch (err) {
      this.logger.error("Could not read local snapshot", { url, error: getErrorMessage(err) });
      return null;
    }
  }

  private saveSnapshot(url: string, html: string): void {
    try {
      const file = this.options.snapshots.save(url, html);
      if (file === null) {
        this.logger.warn("No snapshot file name for URL", { url });
      } else {
        this.logger.debug("Saved snapshot", { file });
      }
    } catch (err) {
      this.logger.error("Could not save snapshot", { url, error: getErrorMessage(err) });
    }
  }

  private async fetchRemote(url: string): Promise<string> {
    const { render, backoffBase, backoffMultiplier } = this.options;
    const request = this.buildRequest(url);

    for (let retryCount = 0; retryCount <= render.maxRetries; retryCount++) {
      this.logger.info(
        `Fetching via rendering service (attempt ${retryCount + 1}/${render.maxRetries + 1})`,
        { url }
      );

      let response: AxiosResponse<unknown>;
      try {
        response = await this.http.post<unknown>(render.apiUrl, request);
      } catch (err) {
        throw new FetchError("transport", url, getErrorMessage(err));
      }

      const attempt: FetchAttempt = {
        url,
        retryCount,
        outcome:
          response.status === 200 ? "ok" : response.status === BAN_STATUS ? "banned" : "failed",
      };
      this.logger.debug("Render attempt finished", { ...attempt, status: response.status });

      if (attempt.outcome === "banned") {
        if (retryCount === render.maxRetries) break;
        const waitSeconds = backoffBase ** retryCount * backoffMultiplier;
        this.logger.warn(
          `Ban detected (${BAN_STATUS}). Retrying in ${waitSeconds}s (retry ${retryCount + 1}/${render.maxRetries})`,
          { url }
        );
        await this.sleep(waitSeconds * 1000);
        continue;
      }

      if (attempt.outcome === "failed") {
        throw new FetchError(
          "upstream-status",
          url,
          `Rendering service returned status ${response.status}`,
          response.status
        );
      }

      const html = readBrowserHtml(response.data);
      if (!html) {
        throw new FetchError("empty-content", url, "No rendered HTML in response", response.status);
      }
      this.logger.info("Fetched rendered page", { url });
      return html;
    }

    throw new FetchError(
      "blocked-exhausted-retries",
      url,
      `Still banned after ${render.maxRetries} retries`,
      BAN_STATUS
    );
  }
}

function readBrowserHtml(data: unknown): string | null {
  let body = data;
  if (typeof body === "string") {
    try {
      body = JSON.parse(body);
    } catch {
      return null;
    }
  }
  if (typeof body === "object" && body !== null && "browserHtml" in body) {
    const html = body.browserHtml;
    return typeof html === "string" && html.trim() !== "" ? html : null;
  }
  return null;
}
