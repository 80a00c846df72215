import * as cheerio from "cheerio";
import { extractBrandInfo } from "./brand-extractor";
import { CatalogData, extractCatalog } from "./catalog/extractor";
import { extractContact } from "./contact-extractor";
import { AxiosPageFetcher, PageFetcher } from "./core/fetcher";
import { Logger, silentLogger } from "./core/logger";
import { getErrorMessage, HttpClientOptions } from "./core/utils";
import { ScrapeFailure, ValidationError } from "./errors";
import { extractImportantLinks, extractNavigation } from "./navigation-extractor";
import { detectPlatform } from "./platform-detector";
import { extractPolicies } from "./policy-extractor";
import { createSiteContext, SiteContext } from "./site-context";
import { extractStoreIdentity } from "./store-identity";
import {
  BrandInfo,
  ContactInfo,
  ExtractionResult,
  ImportantLink,
  NavigationEntry,
  PolicySet,
  StageOutput,
} from "./types";

export interface InsightsDeps {
  /** Fetch boundary; defaults to an axios-backed fetcher built from `http` */
  fetcher?: PageFetcher;
  http?: HttpClientOptions;
  logger?: Logger;
}

export interface StoreTarget {
  /** The URL as the caller meant it, scheme added */
  websiteUrl: string;
  /** Scheme + host, used to resolve every candidate path */
  baseUrl: string;
}

interface NavigationData {
  navigation: NavigationEntry[];
  importantLinks: ImportantLink[];
}

const HAS_SCHEME_RE = /^[a-z][a-z\d+.-]*:\/\//i;

/**
 * Validate and normalize caller input. Adds https:// when no scheme
 * is given. Never touches the network.
 * @throws ValidationError for empty, unparsable, or host-less input
 */
export function normalizeStoreUrl(raw: unknown): StoreTarget {
  if (typeof raw !== "string") {
    throw new ValidationError("website_url must be a string");
  }
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new ValidationError("Empty website_url parameter");
  }

  const withScheme = HAS_SCHEME_RE.test(trimmed)
    ? trimmed
    : `https://${trimmed}`;
  let url: URL;
  try {
    url = new URL(withScheme);
  } catch {
    throw new ValidationError(`Not a valid URL: ${trimmed}`);
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ValidationError(`Unsupported URL scheme: ${url.protocol}`);
  }
  const host = url.hostname;
  if (!host || (!host.includes(".") && host !== "localhost")) {
    throw new ValidationError(`URL has no valid host: ${trimmed}`);
  }

  url.hash = "";
  return { websiteUrl: url.href, baseUrl: url.origin };
}

/**
 * Run one stage; a thrown error becomes a failed StageOutput so the
 * other stages are unaffected.
 */
async function runStage<T>(
  name: string,
  ctx: SiteContext,
  stage: (ctx: SiteContext) => Promise<StageOutput<T>>
): Promise<StageOutput<T>> {
  try {
    return await stage(ctx);
  } catch (err) {
    const message = getErrorMessage(err);
    ctx.logger("warn", `${name} extraction failed: ${message}`);
    return { success: false, error: message };
  }
}

async function navigationStage(
  ctx: SiteContext
): Promise<StageOutput<NavigationData>> {
  const navigation = extractNavigation(ctx.homeHtml, ctx.baseUrl);
  const importantLinks = extractImportantLinks(ctx.homeHtml, ctx.baseUrl);
  const warnings =
    navigation.length === 0 ? ["No navigation menu found on the home page"] : [];
  return { success: true, data: { navigation, importantLinks }, warnings };
}

/**
 * Fold one stage into the result: its data on success, the fallback
 * plus a warning on failure.
 */
function merge<T>(
  name: string,
  output: StageOutput<T>,
  fallback: T,
  warnings: string[]
): T {
  if (output.success) {
    warnings.push(...output.warnings);
    return output.data;
  }
  warnings.push(`${name} extraction failed: ${output.error}`);
  return fallback;
}

/**
 * Build a best-effort ExtractionResult for a storefront URL.
 * @throws ValidationError when the input is not a usable URL
 * @throws ScrapeFailure when the home page cannot be fetched
 */
export async function buildInsights(
  rawUrl: unknown,
  deps: InsightsDeps = {}
): Promise<ExtractionResult> {
  const target = normalizeStoreUrl(rawUrl);
  const logger = deps.logger ?? silentLogger;
  const fetcher = deps.fetcher ?? new AxiosPageFetcher(deps.http);

  logger("info", `Fetching insights for: ${target.websiteUrl}`);
  const home = await fetcher.fetch(target.websiteUrl);
  if (!home.ok) {
    logger(
      "error",
      `Website not accessible: ${target.websiteUrl} (${home.error.message})`
    );
    throw new ScrapeFailure(target.websiteUrl, home.error);
  }

  const homeHtml = home.page.body;
  const warnings: string[] = [];

  const platform = detectPlatform(homeHtml);
  if (!platform.isShopify) {
    logger("warn", `Website may not be a Shopify store: ${target.websiteUrl}`);
    warnings.push("No Shopify signature found; extracting as an unknown platform");
  }

  const identity = extractStoreIdentity(cheerio.load(homeHtml), target.baseUrl);
  if (!identity.name) {
    warnings.push("Store name not found in title, meta tags, logo, or domain");
  }

  const ctx = createSiteContext(
    target.baseUrl,
    homeHtml,
    fetcher,
    logger,
    home.page.url
  );
  const [catalog, policies, brand, contact, navigation] = await Promise.all([
    runStage("catalog", ctx, extractCatalog),
    runStage("policy", ctx, extractPolicies),
    runStage("brand", ctx, extractBrandInfo),
    runStage("contact", ctx, extractContact),
    runStage("navigation", ctx, navigationStage),
  ]);

  const catalogData = merge<CatalogData>(
    "catalog",
    catalog,
    { products: [], featured: [] },
    warnings
  );
  const policyData = merge<PolicySet>("policy", policies, {}, warnings);
  const brandData = merge<BrandInfo>("brand", brand, { faqs: [] }, warnings);
  const contactData = merge<ContactInfo>(
    "contact",
    contact,
    { emails: [], phones: [], socials: [], social_handles: {} },
    warnings
  );
  const navigationData = merge<NavigationData>(
    "navigation",
    navigation,
    { navigation: [], importantLinks: [] },
    warnings
  );

  const policyCount = Object.keys(policyData).length;
  logger(
    "info",
    `Done: ${catalogData.products.length} products, ${policyCount} policies, ` +
      `${warnings.length} warnings`
  );

  return {
    store_name: identity.name,
    domain: identity.domain,
    website_url: target.websiteUrl,
    is_shopify: platform.isShopify,
    products: catalogData.products,
    featured_products: catalogData.featured,
    policies: policyData,
    brand_info: brandData,
    contact: contactData,
    navigation: navigationData.navigation,
    important_links: navigationData.importantLinks,
    warnings,
  };
}
