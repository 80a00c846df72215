import { AxiosInstance } from "axios";
import { FetchError } from "../errors";
import {
  createHttpClient,
  DEFAULT_TIMEOUT_MS,
  getErrorMessage,
  getErrorStatus,
  HttpClientOptions,
  isTimeoutError,
} from "./utils";

/** A fetched page: the body as text plus the final status */
export interface FetchedPage {
  /** Where the body was served from, after redirects */
  url: string;
  status: number;
  body: string;
}

/** Result of a single GET: discriminated union, never thrown */
export type FetchOutcome =
  | { ok: true; page: FetchedPage }
  | { ok: false; error: FetchError };

/**
 * The fetch boundary every stage goes through.
 * Implementations must resolve, never reject.
 */
export interface PageFetcher {
  fetch(url: string): Promise<FetchOutcome>;
}

/**
 * PageFetcher backed by a configured axios instance.
 * One attempt per call, bounded by a hard timeout.
 */
export class AxiosPageFetcher implements PageFetcher {
  private readonly http: AxiosInstance;
  private readonly timeoutMs: number;

  constructor(options: HttpClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.http = createHttpClient({ ...options, timeoutMs: this.timeoutMs });
  }

  async fetch(url: string): Promise<FetchOutcome> {
    try {
      const response = await this.http.get<unknown>(url, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      const body = typeof response.data === "string" ? response.data : "";

      if (response.status < 200 || response.status >= 300) {
        return {
          ok: false,
          error: new FetchError(
            url,
            "http",
            response.statusText
              ? `HTTP ${response.status}: ${response.statusText}`
              : `HTTP ${response.status}`,
            response.status
          ),
        };
      }

      // The node adapter leaves the post-redirect URL on the raw response
      const finalUrl: unknown = response.request?.res?.responseUrl;
      return {
        ok: true,
        page: {
          url: typeof finalUrl === "string" && finalUrl ? finalUrl : url,
          status: response.status,
          body,
        },
      };
    } catch (err) {
      const kind = isTimeoutError(err) ? "timeout" : "network";
      return {
        ok: false,
        error: new FetchError(url, kind, getErrorMessage(err), getErrorStatus(err)),
      };
    }
  }
}
