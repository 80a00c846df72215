import { ParseError } from "../errors";
import { PriceRange, Product } from "../types";
import { cleanText, toAbsoluteUrl } from "../core/utils";

type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(obj: JsonObject, key: string): string {
  const value = obj[key];
  if (typeof value === "string") return value.trim();
  if (typeof value === "number") return String(value);
  return "";
}

function readArray(obj: JsonObject, key: string): unknown[] {
  const value = obj[key];
  return Array.isArray(value) ? value : [];
}

/**
 * Parse the body of /products.json into its raw product entries.
 * @throws ParseError when the body is not JSON or has no products array
 */
export function parseProductsJson(body: string): unknown[] {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ParseError("products.json", `Invalid JSON: ${detail}`);
  }
  if (!isJsonObject(data) || !Array.isArray(data.products)) {
    throw new ParseError("products.json", "Unexpected shape: no products array");
  }
  return data.products;
}

/** Tags arrive either as an array or as one comma-separated string. */
function readTags(obj: JsonObject): string[] {
  const raw = obj.tags;
  const parts = Array.isArray(raw)
    ? raw.filter((t): t is string => typeof t === "string")
    : typeof raw === "string"
      ? raw.split(",")
      : [];
  return parts.map((t) => t.trim()).filter(Boolean);
}

function readPriceRange(variants: JsonObject[]): PriceRange | null {
  const prices = variants
    .map((v) => Number.parseFloat(readString(v, "price")))
    .filter((n) => Number.isFinite(n));
  if (prices.length === 0) return null;
  return { min_price: Math.min(...prices), max_price: Math.max(...prices) };
}

/**
 * Map one products.json entry to a Product.
 * Price is the first variant's raw price string; image is the first image src.
 * @throws ParseError when the entry has no title or no handle
 */
export function mapShopifyProduct(entry: unknown, baseUrl: string): Product {
  if (!isJsonObject(entry)) {
    throw new ParseError("products.json", "entry is not an object");
  }

  const title = cleanText(readString(entry, "title"));
  const handle = readString(entry, "handle");
  if (!title) throw new ParseError("products.json", "missing title");
  if (!handle) throw new ParseError("products.json", `missing handle for "${title}"`);

  const variants = readArray(entry, "variants").filter(isJsonObject);
  const images = readArray(entry, "images").filter(isJsonObject);

  const firstPrice = variants.length > 0 ? readString(variants[0], "price") : "";
  const firstImage = images.length > 0 ? readString(images[0], "src") : "";

  const product: Product = {
    title,
    price: firstPrice || null,
    url: new URL(`/products/${handle}`, baseUrl).href,
    image_url: firstImage ? toAbsoluteUrl(firstImage, baseUrl) : null,
    handle,
    tags: readTags(entry),
    available: variants.some((v) => v.available === true),
    price_range: readPriceRange(variants),
  };

  const vendor = readString(entry, "vendor");
  if (vendor) product.vendor = vendor;
  const productType = readString(entry, "product_type");
  if (productType) product.product_type = productType;

  return product;
}
