import * as cheerio from "cheerio";
import { FetchedPage, PageFetcher } from "./core/fetcher";
import { Logger } from "./core/logger";
import { cleanText, deduplicateUrls, toAbsoluteUrl } from "./core/utils";
import { fetchSitemapUrls } from "./sitemap-parser";
import { PolicyKind } from "./types";

export type PageKind = PolicyKind | "about" | "faq" | "contact";

/** Conventional path suffixes, tried in this order */
export const CANDIDATE_PATHS: Record<PageKind, string[]> = {
  privacy: [
    "/policies/privacy-policy",
    "/pages/privacy-policy",
    "/privacy-policy",
    "/privacy",
  ],
  returns: [
    "/policies/refund-policy",
    "/pages/return-policy",
    "/pages/returns",
    "/pages/refund-policy",
    "/returns",
    "/refunds",
  ],
  shipping: [
    "/policies/shipping-policy",
    "/pages/shipping-policy",
    "/pages/shipping",
    "/shipping",
  ],
  terms: [
    "/policies/terms-of-service",
    "/pages/terms-of-service",
    "/pages/terms-and-conditions",
    "/terms",
  ],
  about: [
    "/pages/about",
    "/pages/about-us",
    "/pages/our-story",
    "/about",
    "/about-us",
    "/our-story",
  ],
  faq: ["/pages/faq", "/pages/faqs", "/faq", "/faqs", "/pages/help"],
  contact: ["/pages/contact", "/pages/contact-us", "/contact", "/contact-us"],
};

/** Store sections a discovered link may point into */
const LINK_SECTIONS: Record<PageKind, string[]> = {
  privacy: ["policies", "pages"],
  returns: ["policies", "pages"],
  shipping: ["policies", "pages"],
  terms: ["policies", "pages"],
  about: ["pages"],
  faq: ["pages"],
  contact: ["pages"],
};

/** Matched against the page handle, the last path segment */
const HANDLE_PATTERNS: Record<PageKind, RegExp> = {
  privacy: /privacy/i,
  returns: /refund|return/i,
  shipping: /shipping|delivery/i,
  terms: /terms|conditions|^tos$/i,
  about: /about|our-story/i,
  faq: /(^|-)faqs?($|-)|^help(-center)?$|frequently-asked/i,
  contact: /contact/i,
};

/** Matched against the whole anchor label */
const LABEL_PATTERNS: Record<PageKind, RegExp> = {
  privacy: /^privacy( policy| notice| statement)?$/i,
  returns:
    /^(returns?|refunds?)( (and|&) (returns?|refunds?|exchanges?))?( policy)?$/i,
  shipping:
    /^(shipping|delivery)( (and|&) (returns?|delivery))?( policy| information| info)?$/i,
  terms: /^(terms( of service| of use| (and|&) conditions)?|tos)$/i,
  about: /^(about( us)?|our story)$/i,
  faq: /^(faqs?|help|frequently asked questions)$/i,
  contact: /^contact( us)?$/i,
};

/** `/pages/<handle>` or `/policies/<handle>`, optionally under a locale */
const PAGE_PATH_RE =
  /^(?:\/[a-z]{2}(?:-[a-z]{2})?)?\/(pages|policies)\/([^/]+)\/?$/i;

/** Kinds worth a sitemap lookup; policy pages are not listed there on Shopify */
const SITEMAP_KINDS: ReadonlySet<PageKind> = new Set<PageKind>([
  "about",
  "faq",
  "contact",
]);

/**
 * Section and handle of a store page path. Null for anything else,
 * products, collections and blog posts included.
 */
function pageHandle(
  pathname: string
): { section: string; handle: string } | null {
  const match = PAGE_PATH_RE.exec(pathname);
  if (!match) return null;
  return { section: match[1].toLowerCase(), handle: match[2] };
}

function isPageOfKind(pathname: string, kind: PageKind, label = ""): boolean {
  const page = pageHandle(pathname);
  if (!page || !LINK_SECTIONS[kind].includes(page.section)) return false;
  return (
    HANDLE_PATTERNS[kind].test(page.handle) || LABEL_PATTERNS[kind].test(label)
  );
}

/**
 * Links on a page that point at a store page of the given kind, in
 * document order. Only `/pages/` and `/policies/` targets on one of
 * `hosts` count; the handle or the whole label must name the kind.
 */
export function findLinkedPages(
  $: cheerio.CheerioAPI,
  baseUrl: string,
  kind: PageKind,
  hosts: string[] = [new URL(baseUrl).hostname]
): string[] {
  const found: string[] = [];

  $("a[href]").each((_, el) => {
    const $el = $(el);
    const absolute = toAbsoluteUrl($el.attr("href"), baseUrl);
    if (!absolute) return;
    const link = new URL(absolute);
    if (!hosts.includes(link.hostname)) return;
    const label = cleanText($el.text()).replace(/[\s:.]+$/, "");
    if (isPageOfKind(link.pathname, kind, label)) {
      link.hash = "";
      link.search = "";
      found.push(link.href);
    }
  });

  return deduplicateUrls(found);
}

/**
 * Builds the ordered candidate URL list for each page kind.
 * One instance per request; the sitemap is fetched at most once.
 */
export class PageDiscovery {
  private sitemapPages: Promise<string[]> | null = null;
  private readonly $home: cheerio.CheerioAPI;
  private readonly hosts: string[];

  /**
   * @param homeUrl - where the home page was finally served from; links
   *   to that host count as the store's own after a domain redirect
   */
  constructor(
    private readonly baseUrl: string,
    homeHtml: string,
    private readonly fetcher: PageFetcher,
    private readonly logger: Logger,
    homeUrl: string = baseUrl
  ) {
    this.$home = cheerio.load(homeHtml);
    this.hosts = [
      ...new Set([new URL(baseUrl).hostname, new URL(homeUrl).hostname]),
    ];
  }

  /** Fixed candidate paths first, then home page links, then sitemap matches. */
  async candidateUrls(kind: PageKind): Promise<string[]> {
    const fixed = CANDIDATE_PATHS[kind].map(
      (path) => new URL(path, this.baseUrl).href
    );
    const linked = findLinkedPages(this.$home, this.baseUrl, kind, this.hosts);
    const fromSitemap = SITEMAP_KINDS.has(kind)
      ? await this.sitemapMatches(kind)
      : [];
    return deduplicateUrls([...fixed, ...linked, ...fromSitemap]);
  }

  private async sitemapMatches(kind: PageKind): Promise<string[]> {
    const urls = await this.loadSitemapPages();
    return urls.filter((url) => {
      try {
        return isPageOfKind(new URL(url).pathname, kind);
      } catch {
        return false;
      }
    });
  }

  private loadSitemapPages(): Promise<string[]> {
    if (!this.sitemapPages) {
      this.sitemapPages = fetchSitemapUrls(
        new URL("/sitemap.xml", this.baseUrl).href,
        this.fetcher,
        this.logger,
        { childFilter: (loc) => /pages/i.test(loc), maxChildren: 3 }
      );
    }
    return this.sitemapPages;
  }
}

/**
 * Try candidate URLs in order; the first page `accept` turns into a value wins.
 * Failed fetches and rejected pages move on to the next candidate.
 */
export async function fetchFirstMatch<T>(
  urls: string[],
  fetcher: PageFetcher,
  logger: Logger,
  accept: (page: FetchedPage) => T | null
): Promise<{ url: string; value: T } | null> {
  for (const url of urls) {
    const outcome = await fetcher.fetch(url);
    if (!outcome.ok) {
      logger("debug", `Could not access ${url}: ${outcome.error.message}`);
      continue;
    }
    const value = accept(outcome.page);
    if (value !== null) return { url, value };
    logger("debug", `No usable content at ${url}`);
  }
  return null;
}
