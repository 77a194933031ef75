/** Missing or invalid settings. Fatal: aborts the run before any fetch. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export type FetchErrorKind =
  | "blocked-exhausted-retries"
  | "upstream-status"
  | "empty-content"
  | "local-file-missing"
  | "transport";

/**
 * A page could not be obtained. Local to one URL; the orchestrator turns it
 * into "no record" for that URL.
 */
export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly url: string;
  readonly statusCode: number | null;

  constructor(
    kind: FetchErrorKind,
    url: string,
    message: string,
    statusCode: number | null = null
  ) {
    super(message);
    this.name = "FetchError";
    this.kind = kind;
    this.url = url;
    this.statusCode = statusCode;
  }
}

/** The detail extractor threw on the page content. */
export class ParseError extends Error {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Could not parse ${url}: ${detail}`);
    this.name = "ParseError";
    this.url = url;
  }
}
