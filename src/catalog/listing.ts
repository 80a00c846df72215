import * as cheerio from "cheerio";
import { Product } from "../types";
import { cleanText, toAbsoluteUrl } from "../core/utils";

type CheerioEl = ReturnType<cheerio.CheerioAPI>;

/** Price-like text: "$19.99", "€ 12,50", "1.250,00 €", "45 USD" */
export const PRICE_RE =
  /(?:[$€£¥₹]\s?\d[\d.,]*|\b(?:USD|EUR|GBP|CAD|AUD|Rs\.?)\s?\d[\d.,]*|\d[\d.,]*\s?(?:[€£]|\b(?:USD|EUR|GBP|CAD|AUD|kr)\b))/i;

const PRODUCT_LINK_SELECTOR = 'a[href*="/products/"]';

const CARD_SELECTOR = [
  ".product-card",
  ".grid-product",
  ".product-item",
  ".card-wrapper",
  ".product-grid-item",
  ".grid__item--product",
  ".productitem",
  "[data-product-id]",
  "[data-product-card]",
].join(", ");

const TITLE_SELECTOR = '[class*="title"], [class*="name"], h2, h3, h4';

const MAX_FEATURED = 6;

/**
 * Product-card heuristics, tried in priority order; first one that
 * yields at least one product wins.
 */
export type CardStrategy =
  | { name: "card-selector"; selector: string }
  | { name: "product-anchor"; selector: string; maxDepth: number };

export const CARD_STRATEGIES: CardStrategy[] = [
  { name: "card-selector", selector: CARD_SELECTOR },
  { name: "product-anchor", selector: PRODUCT_LINK_SELECTOR, maxDepth: 4 },
];

export interface CardMatch {
  strategy: CardStrategy["name"];
  products: Product[];
  skipped: string[];
}

/** Absolute product URL without query string or fragment */
function productUrl(href: string | undefined, baseUrl: string): string | null {
  const absolute = toAbsoluteUrl(href, baseUrl);
  if (!absolute) return null;
  const url = new URL(absolute);
  url.search = "";
  url.hash = "";
  return url.href;
}

function imageUrl($el: CheerioEl, baseUrl: string): string | null {
  const $img: CheerioEl = $el.is("img") ? $el : $el.find("img").first();
  const src =
    $img.attr("src") ||
    $img.attr("data-src") ||
    $img.attr("data-srcset")?.split(/\s+/)[0];
  return toAbsoluteUrl(src, baseUrl);
}

function priceText($el: CheerioEl): string | null {
  const fromElement = cleanText($el.find('[class*="price"]').first().text());
  const match = (fromElement || cleanText($el.text())).match(PRICE_RE);
  if (match) return match[0].trim();
  return fromElement || null;
}

function titleText($card: CheerioEl, $link: CheerioEl): string {
  return (
    cleanText($card.find(TITLE_SELECTOR).first().text()) ||
    cleanText($link.text()) ||
    cleanText($card.find("img[alt]").first().attr("alt") ?? "")
  );
}

function matchCards($: cheerio.CheerioAPI, baseUrl: string, selector: string): CardMatch {
  const products: Product[] = [];
  const skipped: string[] = [];

  $(selector).each((index, el) => {
    const $card = $(el);
    // Nested wrappers (".card-wrapper .product-card") describe the same card
    if ($card.parents(selector).length > 0) return;

    const $link: CheerioEl = $card.is("a")
      ? $card
      : $card.find(PRODUCT_LINK_SELECTOR).first();
    const url = productUrl($link.attr("href"), baseUrl);
    if (!url) {
      skipped.push(`Skipped product card #${index + 1}: no product link`);
      return;
    }
    const title = titleText($card, $link);
    if (!title) {
      skipped.push(`Skipped product card #${index + 1}: no title (${url})`);
      return;
    }

    products.push({
      title,
      price: priceText($card),
      url,
      image_url: imageUrl($card, baseUrl),
    });
  });

  return { strategy: "card-selector", products, skipped };
}

function matchProductAnchors(
  $: cheerio.CheerioAPI,
  baseUrl: string,
  selector: string,
  maxDepth: number
): CardMatch {
  const products: Product[] = [];
  const skipped: string[] = [];
  const seen = new Set<string>();

  $(selector).each((_, el) => {
    const $link = $(el);
    const url = productUrl($link.attr("href"), baseUrl);
    if (!url || seen.has(url)) return;

    // Nearest ancestor carrying a price marks the card boundary
    let $container: CheerioEl | null = null;
    let $cursor: CheerioEl = $link;
    for (let depth = 0; depth <= maxDepth && $cursor.length; depth++) {
      if (PRICE_RE.test(cleanText($cursor.text()))) {
        $container = $cursor;
        break;
      }
      $cursor = $cursor.parent();
    }
    if (!$container) return;

    seen.add(url);
    const title = titleText($container, $link);
    if (!title) {
      skipped.push(`Skipped product link without title: ${url}`);
      return;
    }
    products.push({
      title,
      price: priceText($container),
      url,
      image_url: imageUrl($container, baseUrl),
    });
  });

  return { strategy: "product-anchor", products, skipped };
}

function runStrategy(
  $: cheerio.CheerioAPI,
  baseUrl: string,
  strategy: CardStrategy
): CardMatch {
  switch (strategy.name) {
    case "card-selector":
      return matchCards($, baseUrl, strategy.selector);
    case "product-anchor":
      return matchProductAnchors($, baseUrl, strategy.selector, strategy.maxDepth);
  }
}

/**
 * Parse product cards from a listing page.
 * Returns the first strategy match with products, or null when none match.
 */
export function extractListingProducts(
  html: string,
  baseUrl: string,
  strategies: CardStrategy[] = CARD_STRATEGIES
): CardMatch | null {
  const $ = cheerio.load(html);
  for (const strategy of strategies) {
    const match = runStrategy($, baseUrl, strategy);
    if (match.products.length > 0) return match;
  }
  return null;
}

/**
 * Featured ("hero") products linked from the home page: the first
 * distinct product links, deduplicated by URL. Links with neither a
 * title nor an image are dropped.
 */
export function extractFeaturedProducts(
  $: cheerio.CheerioAPI,
  baseUrl: string
): Product[] {
  const featured: Product[] = [];
  const seen = new Set<string>();

  $(PRODUCT_LINK_SELECTOR).each((_, el) => {
    if (featured.length >= MAX_FEATURED) return false;
    const $link = $(el);
    const url = productUrl($link.attr("href"), baseUrl);
    if (!url || seen.has(url)) return undefined;
    seen.add(url);

    const title = titleText($link, $link);
    const image = imageUrl($link, baseUrl);
    if (!title && !image) return undefined;

    const price = cleanText($link.find('[class*="price"]').first().text());
    featured.push({ title, price: price || null, url, image_url: image });
    return undefined;
  });

  return featured;
}
