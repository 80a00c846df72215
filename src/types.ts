import { LogLevel } from "./core/logger";

/** Runtime configuration shared by the CLI and the HTTP server */
export interface InsightsConfig {
  storeUrl: string | null;
  inputFile: string | null;
  urlColumn: string | null;
  concurrency: number;
  delayMs: number;
  timeoutMs: number;
  userAgent: string | null;
  outputDir: string;
  port: number;
  logLevel: LogLevel;
}

/** Name and host of the storefront, read once from the home page */
export interface StoreIdentity {
  name: string | null;
  domain: string;
}

export interface PriceRange {
  min_price: number;
  max_price: number;
}

/** One catalog entry. Extras are only filled from /products.json */
export interface Product {
  title: string;
  price: string | null;
  url: string;
  image_url: string | null;
  handle?: string;
  vendor?: string;
  product_type?: string;
  tags?: string[];
  available?: boolean;
  price_range?: PriceRange | null;
}

export type PolicyKind = "privacy" | "returns" | "shipping" | "terms";

/** Partial on purpose: a missing key means the page was not found */
export type PolicySet = Partial<Record<PolicyKind, string>>;

export interface FaqEntry {
  question: string;
  answer: string;
}

export interface BrandInfo {
  about?: string;
  faqs: FaqEntry[];
  /** Unsegmented FAQ page text, kept when no question/answer pairs were found */
  faq_text?: string;
}

export type SocialPlatform =
  | "instagram"
  | "facebook"
  | "twitter"
  | "tiktok"
  | "youtube"
  | "pinterest"
  | "linkedin";

export interface ContactInfo {
  email?: string;
  emails: string[];
  phones: string[];
  address?: string;
  /** Normalized profile URLs, first-seen order, no duplicates */
  socials: string[];
  social_handles: Partial<Record<SocialPlatform, string>>;
}

export interface NavigationEntry {
  label: string;
  url: string;
}

export type ImportantLinkCategory =
  | "order_tracking"
  | "blog"
  | "support"
  | "shipping"
  | "size_guide"
  | "gift_cards"
  | "wholesale";

export interface ImportantLink {
  category: ImportantLinkCategory;
  title: string;
  url: string;
}

/** The single artifact returned to callers */
export interface ExtractionResult {
  store_name: string | null;
  domain: string;
  website_url: string;
  is_shopify: boolean;
  products: Product[];
  featured_products: Product[];
  policies: PolicySet;
  brand_info: BrandInfo;
  contact: ContactInfo;
  navigation: NavigationEntry[];
  important_links: ImportantLink[];
  warnings: string[];
}

/**
 * Outcome of one extraction stage: discriminated union.
 * A successful stage may still carry warnings about skipped items.
 */
export type StageOutput<T> =
  | { success: true; data: T; warnings: string[] }
  | { success: false; error: string };

/** Wrapper written by the CLI around each result */
export interface InsightsExport {
  scraped_at: string;
  source_url: string;
  insights: ExtractionResult;
}

/** Record for a store URL that could not be processed in batch mode */
export interface BatchError {
  url: string;
  error_type: "validation" | "scrape_failure" | "unexpected";
  error_message: string;
}

/** Statistics written to summary.json after a batch run */
export interface BatchSummary {
  input_file: string;
  total_urls_in_file: number;
  total_urls_after_dedup: number;
  total_success: number;
  total_errors: number;
  success_rate: string;
  elapsed_time: string;
  output_files: string[];
  finished_at: string;
}
