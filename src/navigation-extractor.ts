import * as cheerio from "cheerio";
import { cleanText, toAbsoluteUrl } from "./core/utils";
import { ImportantLink, ImportantLinkCategory, NavigationEntry } from "./types";

/**
 * Menu-region heuristics in priority order. Each names the selector
 * that locates candidate regions; the first that yields entries wins.
 */
export type NavStrategy =
  | { name: "header-nav"; selector: string }
  | { name: "nav-landmark"; selector: string }
  | { name: "aria-navigation"; selector: string }
  | { name: "menu-class"; selector: string }
  | { name: "header-links"; selector: string };

export const NAV_STRATEGIES: NavStrategy[] = [
  { name: "header-nav", selector: "header nav" },
  { name: "nav-landmark", selector: "nav" },
  { name: "aria-navigation", selector: "[role='navigation']" },
  {
    name: "menu-class",
    selector: "[class*='menu'], [id*='menu'], [class*='navigation'], [id*='navigation']",
  },
  { name: "header-links", selector: "header" },
];

const IMPORTANT_LINK_KEYWORDS: Record<ImportantLinkCategory, string[]> = {
  order_tracking: ["track", "tracking", "order-status", "track-order"],
  blog: ["blog", "news", "articles"],
  support: ["support", "help", "customer-service"],
  shipping: ["shipping", "delivery"],
  size_guide: ["size-guide", "sizing", "size-chart", "size guide"],
  gift_cards: ["gift-card", "gift-cards", "gift card"],
  wholesale: ["wholesale", "trade", "bulk"],
};

const IMPORTANT_LINK_CATEGORIES: ImportantLinkCategory[] = [
  "order_tracking",
  "blog",
  "support",
  "shipping",
  "size_guide",
  "gift_cards",
  "wholesale",
];

/** Links that lead nowhere useful as a menu entry */
function isNavigableHref(href: string | undefined): href is string {
  if (!href) return false;
  const value = href.trim().toLowerCase();
  return !(
    value === "" ||
    value.startsWith("#") ||
    value.startsWith("javascript:") ||
    value.startsWith("mailto:") ||
    value.startsWith("tel:")
  );
}

function readEntries(
  $: cheerio.CheerioAPI,
  selector: string,
  baseUrl: string
): NavigationEntry[] {
  const entries: NavigationEntry[] = [];
  const seen = new Set<string>();

  $(selector).each((_, region) => {
    const $region = $(region);
    // A region nested in an earlier match was already read with its parent
    if ($region.parents(selector).length > 0) return;

    $region.find("a[href]").each((_, el) => {
      const $a = $(el);
      const href = $a.attr("href");
      if (!isNavigableHref(href)) return;
      const label =
        cleanText($a.text()) ||
        cleanText($a.attr("aria-label") ?? "") ||
        cleanText($a.attr("title") ?? "");
      const url = toAbsoluteUrl(href, baseUrl);
      if (!label || !url || seen.has(url)) return;
      seen.add(url);
      entries.push({ label, url });
    });
  });

  return entries;
}

/**
 * Read the primary menu into ordered {label, url} pairs.
 * Returns an empty list when no menu region is recognized.
 */
export function extractNavigation(
  html: string,
  baseUrl: string,
  strategies: NavStrategy[] = NAV_STRATEGIES
): NavigationEntry[] {
  const $ = cheerio.load(html);
  for (const strategy of strategies) {
    const entries = readEntries($, strategy.selector, baseUrl);
    if (entries.length > 0) return entries;
  }
  return [];
}

/**
 * Pick the first link per category (order tracking, blog, support, …),
 * looking at nav, header and footer links before the rest of the page.
 * Deduplicated by URL.
 */
export function extractImportantLinks(html: string, baseUrl: string): ImportantLink[] {
  const $ = cheerio.load(html);
  const anchors: Array<{ href: string; text: string }> = [];
  for (const selector of ["nav a[href], header a[href], footer a[href]", "a[href]"]) {
    $(selector).each((_, el) => {
      const href = $(el).attr("href");
      if (isNavigableHref(href)) anchors.push({ href, text: cleanText($(el).text()) });
    });
  }

  const links: ImportantLink[] = [];
  const seen = new Set<string>();

  for (const category of IMPORTANT_LINK_CATEGORIES) {
    const keywords = IMPORTANT_LINK_KEYWORDS[category];
    const hit = anchors.find(({ href, text }) => {
      const lowerHref = href.toLowerCase();
      const lowerText = text.toLowerCase();
      return keywords.some((kw) => lowerHref.includes(kw) || lowerText.includes(kw));
    });
    if (!hit) continue;

    const url = toAbsoluteUrl(hit.href, baseUrl);
    if (!url || seen.has(url)) continue;
    seen.add(url);
    links.push({ category, title: hit.text, url });
  }

  return links;
}
