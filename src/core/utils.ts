import axios, { AxiosError, AxiosInstance, CreateAxiosDefaults } from "axios";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36";

export const DEFAULT_TIMEOUT_MS = 10_000;

/** Fixed browser-like headers sent with every request */
export const DEFAULT_HEADERS: Readonly<Record<string, string>> = {
  "User-Agent": DEFAULT_USER_AGENT,
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,application/json;q=0.8,*/*;q=0.7",
  "Accept-Language": "en-US,en;q=0.9",
};

/** Explicit client configuration, passed in rather than held in module state */
export interface HttpClientOptions {
  timeoutMs?: number;
  headers?: Record<string, string>;
  maxRedirects?: number;
  /** Replaces the transport; tests use it to serve fixtures in process */
  adapter?: CreateAxiosDefaults["adapter"];
}

/**
 * Create a configured axios instance with realistic browser headers.
 * Every status is resolved so callers decide what counts as success.
 */
export function createHttpClient(options: HttpClientOptions = {}): AxiosInstance {
  return axios.create({
    timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    headers: { ...DEFAULT_HEADERS, ...options.headers },
    maxRedirects: options.maxRedirects ?? 5,
    responseType: "text",
    // Keep bodies as text: /products.json is parsed by the catalog stage
    transformResponse: [(data: unknown) => data],
    validateStatus: () => true,
    adapter: options.adapter,
  });
}

/**
 * Sleep for the given number of milliseconds.
 * @param ms - Milliseconds to wait
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Process items in batches with configurable concurrency and delay.
 * @param concurrency - Max items to process in parallel per batch
 * @param delayMs - Milliseconds to wait between batches
 * @param onItemDone - Callback after each item completes
 * @returns Array of results in input order
 */
export async function runInBatches<T, R>(
  items: T[],
  concurrency: number,
  delayMs: number,
  processor: (item: T) => Promise<R>,
  onItemDone: (completed: number, total: number, item: T, result: R) => void
): Promise<R[]> {
  const results: R[] = [];
  let completed = 0;

  for (let i = 0; i < items.length; i += concurrency) {
    const batch = items.slice(i, i + concurrency);
    const batchResults = await Promise.all(
      batch.map(async (item) => {
        const result = await processor(item);
        completed++;
        onItemDone(completed, items.length, item, result);
        return result;
      })
    );
    results.push(...batchResults);

    if (i + concurrency < items.length) {
      await sleep(delayMs);
    }
  }

  return results;
}

/**
 * Deduplicate an array of URL strings, preserving order of first occurrence.
 * A trailing slash does not make two URLs distinct.
 */
export function deduplicateUrls(urls: string[]): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];
  for (const url of urls) {
    const normalized = url.replace(/\/$/, "");
    if (!seen.has(normalized)) {
      seen.add(normalized);
      unique.push(url);
    }
  }
  return unique;
}

/** Collapse runs of whitespace into single spaces and trim. */
export function cleanText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Resolve an href against a base URL.
 * Returns null for empty, fragment-only, or non-http(s) links.
 */
export function toAbsoluteUrl(href: string | undefined, baseUrl: string): string | null {
  const raw = href?.trim();
  if (!raw || raw.startsWith("#")) return null;
  try {
    const resolved = new URL(raw, baseUrl);
    if (resolved.protocol !== "http:" && resolved.protocol !== "https:") return null;
    return resolved.href;
  } catch {
    return null;
  }
}

/**
 * Parse an integer setting and clamp it into range.
 * Falls back when the raw value is missing or not a number.
 */
export function clampInt(
  raw: string | number | undefined,
  fallback: number,
  min: number,
  max: number
): number {
  const num = typeof raw === "number" ? raw : Number.parseInt(raw ?? "", 10);
  if (!Number.isFinite(num)) return fallback;
  return Math.min(max, Math.max(min, Math.floor(num)));
}

/** True when an axios error means the request ran out of time. */
export function isTimeoutError(err: unknown): boolean {
  if (err instanceof AxiosError) {
    return (
      err.code === AxiosError.ECONNABORTED ||
      err.code === AxiosError.ETIMEDOUT ||
      err.code === AxiosError.ERR_CANCELED
    );
  }
  return (
    err instanceof Error &&
    (err.name === "TimeoutError" || err.name === "AbortError")
  );
}

/**
 * Extract a human-readable error message from an unknown error.
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof AxiosError) {
    if (isTimeoutError(err)) return "Request timed out";
    if (err.code === "ENOTFOUND")
      return `DNS lookup failed: ${err.config?.url ?? "unknown host"}`;
    if (err.code === "ERR_TLS_CERT_ALTNAME_INVALID")
      return "SSL certificate error";
    if (err.code === "ECONNRESET") return "Connection reset by server";
    if (err.code === "ECONNREFUSED") return "Connection refused";
    if (err.response)
      return `HTTP ${err.response.status}: ${err.response.statusText}`;
    return err.message;
  }
  if (isTimeoutError(err)) return "Request timed out";
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Extract the HTTP status code from an error, if available.
 */
export function getErrorStatus(err: unknown): number | null {
  if (err instanceof AxiosError && err.response) {
    return err.response.status;
  }
  return null;
}

/**
 * Format a duration in milliseconds to a human-readable string like "2m 30s".
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes === 0) return `${seconds}s`;
  return `${minutes}m ${seconds}s`;
}
