import { XMLParser } from "fast-xml-parser";
import { PageFetcher } from "./core/fetcher";
import { Logger } from "./core/logger";

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  isArray: (name) => name === "sitemap" || name === "url",
});

export type ParsedSitemap =
  | { kind: "index"; locs: string[] }
  | { kind: "urlset"; locs: string[] }
  | { kind: "unknown"; locs: [] };

interface SitemapOptions {
  /** Only follow child sitemaps whose URL passes this test */
  childFilter?: (childUrl: string) => boolean;
  /** Upper bound on child sitemaps fetched from an index */
  maxChildren?: number;
}

function readLocs(entries: unknown): string[] {
  if (!Array.isArray(entries)) return [];
  const locs: string[] = [];
  for (const entry of entries) {
    if (entry && typeof entry === "object" && "loc" in entry) {
      const loc = entry.loc;
      if (typeof loc === "string" && loc.trim()) locs.push(loc.trim());
    }
  }
  return locs;
}

function safeParse(xml: string): unknown {
  try {
    return xmlParser.parse(xml);
  } catch {
    return null;
  }
}

/**
 * Parse sitemap XML into either a list of child sitemaps (index)
 * or a list of page URLs (urlset).
 */
export function parseSitemapXml(xml: string): ParsedSitemap {
  const parsed = safeParse(xml);
  if (!parsed || typeof parsed !== "object") return { kind: "unknown", locs: [] };

  // Sitemap index: contains <sitemapindex><sitemap><loc>
  if (
    "sitemapindex" in parsed &&
    parsed.sitemapindex &&
    typeof parsed.sitemapindex === "object"
  ) {
    const index = parsed.sitemapindex;
    return {
      kind: "index",
      locs: readLocs("sitemap" in index ? index.sitemap : undefined),
    };
  }

  // Standard sitemap: contains <urlset><url><loc>
  if ("urlset" in parsed && parsed.urlset && typeof parsed.urlset === "object") {
    const urlset = parsed.urlset;
    return { kind: "urlset", locs: readLocs("url" in urlset ? urlset.url : undefined) };
  }

  return { kind: "unknown", locs: [] };
}

/**
 * Fetch and parse a sitemap URL, returning the page URLs found.
 * Follows one level of sitemap index. Fetch failures yield an empty list.
 */
export async function fetchSitemapUrls(
  sitemapUrl: string,
  fetcher: PageFetcher,
  logger: Logger,
  options: SitemapOptions = {}
): Promise<string[]> {
  const outcome = await fetcher.fetch(sitemapUrl);
  if (!outcome.ok) {
    logger("debug", `Sitemap unavailable at ${sitemapUrl}: ${outcome.error.message}`);
    return [];
  }

  const sitemap = parseSitemapXml(outcome.page.body);
  if (sitemap.kind === "urlset") return sitemap.locs;

  if (sitemap.kind === "index") {
    const children = sitemap.locs
      .filter((loc) => (options.childFilter ? options.childFilter(loc) : true))
      .slice(0, options.maxChildren ?? 5);
    logger("debug", `Sitemap index with ${children.length} child sitemap(s) to follow`);

    const allUrls: string[] = [];
    for (const childUrl of children) {
      const childOutcome = await fetcher.fetch(childUrl);
      if (!childOutcome.ok) {
        logger(
          "debug",
          `Child sitemap unavailable at ${childUrl}: ${childOutcome.error.message}`
        );
        continue;
      }
      const child = parseSitemapXml(childOutcome.page.body);
      if (child.kind === "urlset") allUrls.push(...child.locs);
    }
    return allUrls;
  }

  logger("debug", `No URLs found in ${sitemapUrl}`);
  return [];
}
