import * as path from "path";
import { config as loadEnv } from "dotenv";
import { loadSettings } from "./core/config";
import { ConfigurationError } from "./core/errors";
import { PageFetcher } from "./core/fetcher";
import { createLogger, setLogLevel } from "./core/logger";
import { SnapshotStore } from "./core/snapshot-store";
import { formatDuration, getErrorMessage } from "./core/utils";
import { parseArgs } from "./args";
import { acquireProducts } from "./product-crawler";
import { FileProductSink } from "./product-exporter";

async function main(): Promise<void> {
  loadEnv();
  const settings = loadSettings();
  setLogLevel(settings.logLevel);
  const logger = createLogger("cli");

  const args = parseArgs(process.argv.slice(2));
  if (!args.query) {
    throw new ConfigurationError('No search query provided. Usage: --q="desk lamp" [--n=10]');
  }

  const outputDir = path.resolve(args.outputDir ?? settings.outputDir);
  const snapshots = new SnapshotStore(path.resolve(args.snapshotDir ?? settings.snapshotDir));

  const fetcher = new PageFetcher({
    mode: args.mode,
    render: settings.render,
    backoffBase: settings.backoffBase,
    backoffMultiplier: settings.backoffMultiplier,
    snapshots,
    saveSnapshots: args.saveSnapshots,
  });
  const sink = new FileProductSink(outputDir);

  const concurrency = args.concurrency ?? settings.maxConcurrency;
  const startTime = Date.now();

  const result = await acquireProducts(args.query, args.count ?? settings.productLimit, {
    fetcher,
    baseUrl: settings.baseUrl,
    delayMs: args.delayMs ?? settings.productDelayMs,
    concurrency: concurrency === 0 ? Infinity : concurrency,
    sink,
  });

  if (result.failures.length > 0) {
    logger.warn(`Failed URLs (${result.failures.length}):`);
    for (const f of result.failures) {
      logger.warn(`  x ${f.url}: ${f.error}`);
    }
  }

  logger.info(`Done in ${formatDuration(Date.now() - startTime)}`, {
    success: `${result.succeeded}/${result.attempted}`,
    skipped: result.skipped_without_snapshot,
    output: sink.written,
  });
}

main().catch((err: unknown) => {
  const logger = createLogger("cli");
  if (err instanceof ConfigurationError) {
    logger.error(`Configuration error: ${err.message}`);
  } else {
    logger.error(`Run failed: ${getErrorMessage(err)}`);
  }
  process.exit(1);
});
