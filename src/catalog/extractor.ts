import { ParseError } from "../errors";
import { loadHome, SiteContext } from "../site-context";
import { Product, StageOutput } from "../types";
import { extractFeaturedProducts, extractListingProducts } from "./listing";
import { mapShopifyProduct, parseProductsJson } from "./products-json";

/** Listing pages tried, in order, when /products.json is unusable */
export const LISTING_PATHS = [
  "/collections/all",
  "/collections/all-products",
  "/products",
];

export interface CatalogData {
  products: Product[];
  featured: Product[];
}

/**
 * Map /products.json. Returns null (with the reason in `warnings`) when
 * the endpoint is unreachable, malformed, or empty.
 */
async function fromProductsJson(
  ctx: SiteContext,
  warnings: string[]
): Promise<Product[] | null> {
  const url = new URL("/products.json", ctx.baseUrl).href;
  const outcome = await ctx.fetcher.fetch(url);
  if (!outcome.ok) {
    warnings.push(
      `products.json unavailable (${outcome.error.message}); falling back to listing pages`
    );
    return null;
  }

  let entries: unknown[];
  try {
    entries = parseProductsJson(outcome.page.body);
  } catch (err) {
    if (!(err instanceof ParseError)) throw err;
    warnings.push(
      `products.json unusable (${err.message}); falling back to listing pages`
    );
    return null;
  }

  const products: Product[] = [];
  entries.forEach((entry, index) => {
    try {
      products.push(mapShopifyProduct(entry, ctx.baseUrl));
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      warnings.push(`Skipped product #${index + 1} from products.json: ${err.message}`);
    }
  });

  if (products.length === 0) {
    warnings.push("products.json returned no products; falling back to listing pages");
    return null;
  }
  return products;
}

/** Scrape listing pages, then the home page itself, for product cards. */
async function fromListingPages(
  ctx: SiteContext,
  warnings: string[]
): Promise<Product[]> {
  for (const path of LISTING_PATHS) {
    const url = new URL(path, ctx.baseUrl).href;
    const outcome = await ctx.fetcher.fetch(url);
    if (!outcome.ok) {
      ctx.logger(
        "debug",
        `Listing page unavailable at ${url}: ${outcome.error.message}`
      );
      continue;
    }
    const match = extractListingProducts(outcome.page.body, ctx.baseUrl);
    if (match) {
      ctx.logger(
        "info",
        `Found ${match.products.length} products at ${url} (${match.strategy})`
      );
      warnings.push(...match.skipped);
      return match.products;
    }
  }

  const homeMatch = extractListingProducts(ctx.homeHtml, ctx.baseUrl);
  if (homeMatch) {
    ctx.logger(
      "info",
      `Found ${homeMatch.products.length} products on the home page (${homeMatch.strategy})`
    );
    warnings.push(...homeMatch.skipped);
    return homeMatch.products;
  }

  warnings.push("No products found in listing pages");
  return [];
}

/**
 * Catalog stage: /products.json first, DOM listing fallback second.
 * Featured products always come from the home page links.
 */
export async function extractCatalog(
  ctx: SiteContext
): Promise<StageOutput<CatalogData>> {
  const warnings: string[] = [];

  const fromJson = await fromProductsJson(ctx, warnings);
  if (fromJson) {
    ctx.logger("info", `Found ${fromJson.length} products in products.json`);
  }
  const products = fromJson ?? (await fromListingPages(ctx, warnings));

  const featured = extractFeaturedProducts(loadHome(ctx), ctx.baseUrl);
  ctx.logger("info", `Found ${featured.length} featured products`);

  return { success: true, data: { products, featured }, warnings };
}
