import axios, { AxiosError, AxiosInstance } from "axios";

/**
 * Create the axios instance used to talk to the rendering service.
 * Every status is resolved rather than thrown: the fetcher decides what
 * a 520 or a 503 means.
 * @param timeout - Per-request timeout in milliseconds
 * @param apiKey - Sent as the Basic auth user name with an empty password
 */
export function createRenderClient(timeout: number, apiKey: string): AxiosInstance {
  return axios.create({
    timeout,
    auth: { username: apiKey, password: "" },
    headers: {
      Accept: "application/json",
      "Content-Type": "application/json",
    },
    responseType: "json",
    validateStatus: () => true,
  });
}

/**
 * Sleep for the given number of milliseconds.
 * @param ms - Milliseconds to wait
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface PacingOptions {
  /** Wait between two launches; never applied after the last one */
  delayMs: number;
  /** Max tasks in flight; Infinity launches on pacing alone */
  concurrency: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Launch one task per item, pacing launches and capping how many run at once,
 * then wait for all of them. The processor should resolve for every item
 * (model failures in its result) so one bad item never cancels the rest.
 * @returns Results in input order, regardless of completion order
 */
export async function runPaced<T, R>(
  items: readonly T[],
  options: PacingOptions,
  processor: (item: T, index: number) => Promise<R>,
  onItemDone?: (completed: number, total: number, item: T, result: R) => void
): Promise<R[]> {
  const wait = options.sleep ?? sleep;
  const limit = Math.max(1, options.concurrency);
  const results = new Array<R>(items.length);
  const running = new Set<Promise<void>>();
  let completed = 0;

  for (let i = 0; i < items.length; i++) {
    while (running.size >= limit) {
      await Promise.race(running);
    }

    const item = items[i];
    const task: Promise<void> = processor(item, i)
      .then((result) => {
        results[i] = result;
        completed++;
        onItemDone?.(completed, items.length, item, result);
      })
      .finally(() => {
        running.delete(task);
      });
    running.add(task);

    if (i < items.length - 1 && options.delayMs > 0) {
      await wait(options.delayMs);
    }
  }

  await Promise.all(running);
  return results;
}

/**
 * Extract a human-readable error message from an unknown error.
 * @param err - The caught error
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof AxiosError) {
    if (err.code === "ECONNABORTED" || err.code === "ETIMEDOUT") return "Request timed out";
    if (err.code === "ENOTFOUND")
      return `DNS lookup failed: ${err.config?.url ?? "unknown host"}`;
    if (err.code === "ECONNRESET") return "Connection reset by server";
    if (err.code === "ECONNREFUSED") return "Connection refused";
    if (err.response)
      return `HTTP ${err.response.status}: ${err.response.statusText}`;
    return err.message;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Format a duration in milliseconds to a human-readable string like "2m 30s".
 * @param ms - Duration in milliseconds
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes === 0) return `${seconds}s`;
  return `${minutes}m ${seconds}s`;
}
