import * as cheerio from "cheerio";

/** Plain substrings that only Shopify-rendered pages carry */
const SHOPIFY_MARKERS = [
  "cdn.shopify.com",
  "Shopify.theme",
  "Shopify.shop",
  "shopify-section",
  "myshopify.com",
];

export interface PlatformDetection {
  isShopify: boolean;
  signals: string[];
}

/**
 * Scan home page HTML for Shopify signatures. Pure, no I/O.
 * Every matching signal is reported so callers can log why.
 */
export function detectPlatform(html: string): PlatformDetection {
  const signals = SHOPIFY_MARKERS.filter((marker) => html.includes(marker));

  const $ = cheerio.load(html);
  const generator = $('meta[name="generator"]').attr("content") ?? "";
  if (/shopify/i.test(generator)) signals.push("meta:generator");
  if ($('meta[name="shopify-checkout-api-token"]').length) {
    signals.push("meta:shopify-checkout-api-token");
  }
  if ($('meta[name="shopify-digital-wallet"]').length) {
    signals.push("meta:shopify-digital-wallet");
  }

  return { isShopify: signals.length > 0, signals };
}

export function isShopify(html: string): boolean {
  return detectPlatform(html).isShopify;
}
