/**
 * Leveled console logger.
 *
 * One line per entry: `timestamp LEVEL [component] message {meta}`.
 * The threshold comes from LOG_LEVEL (debug, info, warn, error); default info.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

let threshold: LogLevel = resolveLevel(process.env.LOG_LEVEL);

function resolveLevel(raw: string | undefined): LogLevel {
  const level = raw?.toLowerCase() ?? "";
  return isLogLevel(level) ? level : "info";
}

/** Override the threshold after settings are loaded. */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function write(level: LogLevel, component: string, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[threshold]) return;

  const metaStr = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  const line = `${new Date().toISOString()} ${level.toUpperCase().padEnd(5)} [${component}] ${message}${metaStr}`;

  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
}

export function createLogger(component: string): Logger {
  return {
    debug: (message, meta) => write("debug", component, message, meta),
    info: (message, meta) => write("info", component, message, meta),
    warn: (message, meta) => write("warn", component, message, meta),
    error: (message, meta) => write("error", component, message, meta),
  };
}
