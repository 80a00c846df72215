export type FetchErrorKind = "timeout" | "network" | "http";

/** Base class for every error this package raises or reports */
export class InsightsError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Bad caller input. Raised before any network call is made. */
export class ValidationError extends InsightsError {
  constructor(message: string) {
    super("VALIDATION_ERROR", message);
  }
}

/**
 * A single GET that timed out, could not connect, or answered non-2xx.
 * Routine: fetchers return it rather than throw it.
 */
export class FetchError extends InsightsError {
  readonly url: string;
  readonly kind: FetchErrorKind;
  readonly status: number | null;

  constructor(
    url: string,
    kind: FetchErrorKind,
    message: string,
    status: number | null = null
  ) {
    super("FETCH_ERROR", message);
    this.url = url;
    this.kind = kind;
    this.status = status;
  }
}

/** Malformed JSON or HTML at a specific extraction step */
export class ParseError extends InsightsError {
  readonly source: string;

  constructor(source: string, message: string) {
    super("PARSE_ERROR", message);
    this.source = source;
  }
}

/** The home page could not be fetched: nothing to extract from */
export class ScrapeFailure extends InsightsError {
  readonly url: string;
  readonly fetchError: FetchError;

  constructor(url: string, fetchError: FetchError) {
    super("SCRAPE_FAILURE", `Website not accessible: ${url} (${fetchError.message})`);
    this.url = url;
    this.fetchError = fetchError;
  }
}
