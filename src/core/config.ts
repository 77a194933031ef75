import { z } from "zod";
import { ConfigurationError } from "./errors";

const int = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const settingsSchema = z.object({
  RENDER_API_KEY: z.string().default(""),
  RENDER_API_URL: z.string().url().default("https://api.zyte.com/v1/extract"),
  RENDER_TIMEOUT_MS: int(180_000),
  RENDER_MAX_RETRIES: int(3),
  RENDER_WAIT_SECONDS: int(5),
  RENDER_GEOLOCATION: z.string().min(1).default("US"),
  RENDER_DEVICE: z.enum(["desktop", "mobile"]).default("desktop"),
  RENDER_SESSION_HASH_MOD: z.coerce.number().int().positive().default(1000),

  SITE_BASE_URL: z.string().url().default("https://www.amazon.com"),
  SNAPSHOT_DIR: z.string().min(1).default("html_snapshots"),
  OUTPUT_DIR: z.string().min(1).default("data"),

  PRODUCT_LIMIT: z.coerce.number().int().positive().default(10),
  PRODUCT_DELAY_MS: int(2000),
  MAX_CONCURRENCY: int(4),
  RETRY_BACKOFF_BASE: z.coerce.number().positive().default(2),
  RETRY_BACKOFF_MULTIPLIER: z.coerce.number().nonnegative().default(2),

  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

type RawSettings = z.infer<typeof settingsSchema>;

/** Run-wide settings, resolved once and passed explicitly to each component. */
export interface ScrapeSettings {
  render: {
    apiKey: string;
    apiUrl: string;
    timeoutMs: number;
    maxRetries: number;
    waitSeconds: number;
    geolocation: string;
    device: "desktop" | "mobile";
    sessionHashMod: number;
  };
  baseUrl: string;
  snapshotDir: string;
  outputDir: string;
  productLimit: number;
  productDelayMs: number;
  /** 0 means no cap */
  maxConcurrency: number;
  backoffBase: number;
  backoffMultiplier: number;
  logLevel: RawSettings["LOG_LEVEL"];
}

/**
 * Validate environment variables into ScrapeSettings.
 * Empty strings count as unset so `.env` placeholders fall back to defaults.
 * @throws ConfigurationError listing every invalid key
 */
export function loadSettings(
  env: Record<string, string | undefined> = process.env
): ScrapeSettings {
  const cleaned: Record<string, string> = {};
  for (const key of Object.keys(settingsSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== "") cleaned[key] = value.trim();
  }

  const parsed = settingsSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid settings: ${issues}`);
  }

  const s = parsed.data;
  return {
    render: {
      apiKey: s.RENDER_API_KEY,
      apiUrl: s.RENDER_API_URL,
      timeoutMs: s.RENDER_TIMEOUT_MS,
      maxRetries: s.RENDER_MAX_RETRIES,
      waitSeconds: s.RENDER_WAIT_SECONDS,
      geolocation: s.RENDER_GEOLOCATION,
      device: s.RENDER_DEVICE,
      sessionHashMod: s.RENDER_SESSION_HASH_MOD,
    },
    baseUrl: s.SITE_BASE_URL.replace(/\/+$/, ""),
    snapshotDir: s.SNAPSHOT_DIR,
    outputDir: s.OUTPUT_DIR,
    productLimit: s.PRODUCT_LIMIT,
    productDelayMs: s.PRODUCT_DELAY_MS,
    maxConcurrency: s.MAX_CONCURRENCY,
    backoffBase: s.RETRY_BACKOFF_BASE,
    backoffMultiplier: s.RETRY_BACKOFF_MULTIPLIER,
    logLevel: s.LOG_LEVEL,
  };
}
