import * as cheerio from "cheerio";

/** Selectors tried in order to find the main content area */
const CONTENT_SELECTORS: cheerio.SelectorType[] = [
  "main",
  "article",
  ".rte",
  ".shopify-policy__body",
  ".main-content",
  ".page-content",
  "#content",
  ".content",
];

const NOISE_SELECTORS = "script, style, noscript, iframe, svg, nav, header, footer, form";

/** Block-level elements whose boundaries become line breaks */
const BLOCK_SELECTORS =
  "p, div, section, li, h1, h2, h3, h4, h5, h6, br, tr, dt, dd, blockquote";

/** Inline elements that need a space before a directly adjacent element */
const INLINE_SELECTORS = "a, span, td, th, label, strong, em, b, small, s";

const MAX_CONTENT_LENGTH = 20_000;

/** Private-use character marking block boundaries; not matched by \s */
const BLOCK_MARK = "\uE000";

/**
 * Reduce a page to clean prose: drop boilerplate, pick the main content
 * container by selector cascade (falling back to <body>), and collapse
 * whitespace while keeping paragraph breaks.
 */
export function extractMainText(html: string): string {
  const $ = cheerio.load(html);
  $(NOISE_SELECTORS).remove();

  let $root = $("body").first();
  for (const sel of CONTENT_SELECTORS) {
    const el = $(sel).first();
    if (el.length && el.text().trim()) {
      $root = el;
      break;
    }
  }

  $root.find(BLOCK_SELECTORS).each((_, el) => {
    $(el).prepend(BLOCK_MARK).append(BLOCK_MARK);
  });
  // "<a>Mug</a><span>$18</span>" reads "Mug $18"; "<a>terms</a>." stays put
  $root.find(INLINE_SELECTORS).each((_, el) => {
    const next = el.next;
    if (next && "name" in next) $(el).append(" ");
  });

  const lines = $root
    .text()
    .split(BLOCK_MARK)
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter(Boolean);

  return lines.join("\n").slice(0, MAX_CONTENT_LENGTH).trim();
}

/**
 * Whole-page visible text with scripts and styles removed, single-spaced.
 * Works on a copy; the given document is left untouched.
 */
export function extractPageText($: cheerio.CheerioAPI): string {
  const $clone = cheerio.load($.html());
  $clone("script, style, noscript, template").remove();
  // Adjacent blocks must not run together ("Email" + "hi@x.com")
  $clone(`${BLOCK_SELECTORS}, td, th, a, span, address`).append(" ");
  return $clone("body").text().replace(/\s+/g, " ").trim();
}
