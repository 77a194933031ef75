import { ConfigurationError } from "./core/errors";
import type { FetchMode } from "./core/fetcher";

export interface CliArgs {
  query?: string;
  count?: number;
  mode: FetchMode;
  saveSnapshots: boolean;
  outputDir?: string;
  snapshotDir?: string;
  concurrency?: number;
  delayMs?: number;
}

const MODES: readonly FetchMode[] = ["remote", "local", "offline"];

function isMode(value: string): value is FetchMode {
  return MODES.some((m) => m === value);
}

function parseCount(raw: string | undefined, flag: string): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) {
    throw new ConfigurationError(`--${flag} must be a non-negative integer, got "${raw}"`);
  }
  return n;
}

/**
 * Parse CLI arguments.
 * Supports --q, --n, --mode, --output, --snapshots, --concurrency, --delay,
 * plus the switches --use-local-html, --offline and --save-snapshots.
 */
export function parseArgs(argv: string[]): CliArgs {
  const opts: Record<string, string> = {};
  let mode: FetchMode = "remote";
  let saveSnapshots = false;

  for (const arg of argv) {
    if (arg === "--use-local-html") { mode = "local"; continue; }
    if (arg === "--offline") { mode = "offline"; continue; }
    if (arg === "--save-snapshots") { saveSnapshots = true; continue; }
    const eqIdx = arg.indexOf("=");
    if (arg.startsWith("--") && eqIdx !== -1) {
      opts[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
    }
  }

  if (opts.mode !== undefined) {
    if (!isMode(opts.mode)) {
      throw new ConfigurationError(`--mode must be one of ${MODES.join(", ")}, got "${opts.mode}"`);
    }
    mode = opts.mode;
  }

  return {
    query: opts.q?.trim() || undefined,
    count: parseCount(opts.n, "n"),
    mode,
    saveSnapshots,
    outputDir: opts.output,
    snapshotDir: opts.snapshots,
    concurrency: parseCount(opts.concurrency, "concurrency"),
    delayMs: parseCount(opts.delay, "delay"),
  };
}
