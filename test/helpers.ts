import * as fs from "fs";
import * as path from "path";
import { FetchOutcome, PageFetcher } from "../src/core/fetcher";
import { silentLogger } from "../src/core/logger";
import { FetchError } from "../src/errors";
import { createSiteContext, SiteContext } from "../src/site-context";

export const DEMO_BASE = "https://demo.myshopify.com";

/**
 * A body (200), an explicit status (optionally served from `finalUrl`
 * as after a redirect), or a transport failure
 */
export type Fixture =
  | string
  | { status: number; body?: string; finalUrl?: string }
  | { error: "timeout" | "network" };

/**
 * In-process PageFetcher serving fixtures by absolute URL.
 * Unknown URLs answer 404. Every requested URL is recorded in `calls`.
 */
export class FixtureFetcher implements PageFetcher {
  readonly calls: string[] = [];

  constructor(private readonly routes: Record<string, Fixture> = {}) {}

  async fetch(url: string): Promise<FetchOutcome> {
    this.calls.push(url);
    const fixture = this.routes[url];

    if (fixture === undefined) {
      return { ok: false, error: new FetchError(url, "http", "HTTP 404: Not Found", 404) };
    }
    if (typeof fixture === "string") {
      return { ok: true, page: { url, status: 200, body: fixture } };
    }
    if ("error" in fixture) {
      const message = fixture.error === "timeout" ? "Request timed out" : "Connection refused";
      return { ok: false, error: new FetchError(url, fixture.error, message) };
    }
    if (fixture.status >= 200 && fixture.status < 300) {
      return {
        ok: true,
        page: {
          url: fixture.finalUrl ?? url,
          status: fixture.status,
          body: fixture.body ?? "",
        },
      };
    }
    return {
      ok: false,
      error: new FetchError(url, "http", `HTTP ${fixture.status}`, fixture.status),
    };
  }
}

/** Rejects for URLs matching `pattern`, breaking the PageFetcher contract on purpose. */
export class ThrowingFetcher extends FixtureFetcher {
  constructor(
    routes: Record<string, Fixture>,
    private readonly pattern: RegExp,
    private readonly message: string
  ) {
    super(routes);
  }

  async fetch(url: string): Promise<FetchOutcome> {
    if (this.pattern.test(url)) {
      this.calls.push(url);
      throw new Error(this.message);
    }
    return super.fetch(url);
  }
}

export function readFixture(...segments: string[]): string {
  return fs.readFileSync(path.join(__dirname, "fixtures", ...segments), "utf-8");
}

export function url(pathname: string, base: string = DEMO_BASE): string {
  return new URL(pathname, base).href;
}

/**
 * The demo storefront: Shopify home page, three products in
 * /products.json, a privacy policy, no about or FAQ page.
 */
export function demoStoreRoutes(): Record<string, Fixture> {
  return {
    [url("/")]: readFixture("demo-store", "home.html"),
    [url("/products.json")]: readFixture("demo-store", "products.json"),
    [url("/policies/privacy-policy")]: readFixture("demo-store", "privacy-policy.html"),
  };
}

export function siteContextFor(
  homeHtml: string,
  routes: Record<string, Fixture> = {},
  base: string = DEMO_BASE
): { ctx: SiteContext; fetcher: FixtureFetcher } {
  const fetcher = new FixtureFetcher(routes);
  return { ctx: createSiteContext(base, homeHtml, fetcher, silentLogger), fetcher };
}
