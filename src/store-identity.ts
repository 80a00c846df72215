import * as cheerio from "cheerio";
import { StoreIdentity } from "./types";
import { cleanText } from "./core/utils";

/** Trailing " - Shop", " | Online Store", " – eCommerce …" etc. */
const TITLE_SUFFIX_RE = /\s*[-–|]\s*(shop|store|online|ecommerce).*$/i;

const GENERIC_ALT_TEXT = new Set(["logo", "image"]);

/**
 * Derive a readable label from the host:
 * "www.acme-goods.com" → "Acme-Goods", "demo.myshopify.com" → "Demo".
 */
export function nameFromDomain(domain: string): string {
  const label = domain
    .replace(/^www\./, "")
    .replace(/\.myshopify\.com$/, "")
    .replace(/\.com$/, "");
  return label.replace(
    /(^|[\s.-])([a-z])/g,
    (_, sep: string, ch: string) => sep + ch.toUpperCase()
  );
}

/**
 * Resolve the store name from the home page.
 * Order: <title> without shop suffixes, og:site_name, first meaningful
 * <img alt>, then the domain label.
 */
export function extractStoreIdentity(
  $: cheerio.CheerioAPI,
  baseUrl: string
): StoreIdentity {
  const domain = new URL(baseUrl).hostname;

  const title = cleanText($("title").first().text()).replace(TITLE_SUFFIX_RE, "");
  if (title) return { name: title, domain };

  const siteName = cleanText($('meta[property="og:site_name"]').attr("content") ?? "");
  if (siteName) return { name: siteName, domain };

  let altName = "";
  $("img[alt]").each((_, el) => {
    const alt = cleanText($(el).attr("alt") ?? "");
    if (alt && !GENERIC_ALT_TEXT.has(alt.toLowerCase())) {
      altName = alt;
      return false;
    }
    return undefined;
  });
  if (altName) return { name: altName, domain };

  const fromDomain = nameFromDomain(domain);
  return { name: fromDomain || null, domain };
}
