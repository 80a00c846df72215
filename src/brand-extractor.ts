import * as cheerio from "cheerio";
import { extractMainText } from "./core/content";
import { cleanText } from "./core/utils";
import { fetchFirstMatch } from "./page-discovery";
import { SiteContext } from "./site-context";
import { BrandInfo, FaqEntry, StageOutput } from "./types";

/**
 * FAQ segmentation heuristics, tried in order. The first one that
 * yields at least one question/answer pair wins.
 */
export type FaqStrategy =
  | { name: "details-summary" }
  | { name: "definition-list" }
  | { name: "heading-answer"; questionSelector: string; answerSelector: string };

export const FAQ_STRATEGIES: FaqStrategy[] = [
  { name: "details-summary" },
  { name: "definition-list" },
  {
    name: "heading-answer",
    questionSelector: 'h1, h2, h3, h4, h5, h6, .question, [class*="question"], button',
    answerSelector: "p, div, dd",
  },
];

function fromDetails($: cheerio.CheerioAPI): FaqEntry[] {
  const pairs: FaqEntry[] = [];
  $("details").each((_, el) => {
    const $details = $(el);
    const question = cleanText($details.children("summary").first().text());
    const $body = $details.clone();
    $body.children("summary").remove();
    const answer = cleanText($body.text());
    if (question && answer) pairs.push({ question, answer });
  });
  return pairs;
}

function fromDefinitionList($: cheerio.CheerioAPI): FaqEntry[] {
  const pairs: FaqEntry[] = [];
  $("dt").each((_, el) => {
    const $dt = $(el);
    const question = cleanText($dt.text());
    const answer = cleanText($dt.nextAll("dd").first().text());
    if (question && answer) pairs.push({ question, answer });
  });
  return pairs;
}

function fromHeadings(
  $: cheerio.CheerioAPI,
  questionSelector: string,
  answerSelector: string
): FaqEntry[] {
  const pairs: FaqEntry[] = [];
  $(questionSelector).each((_, el) => {
    const $q = $(el);
    const question = cleanText($q.text());
    if (!question.includes("?")) return;
    const answer = cleanText($q.nextAll(answerSelector).first().text());
    if (answer) pairs.push({ question, answer });
  });
  return pairs;
}

function runFaqStrategy($: cheerio.CheerioAPI, strategy: FaqStrategy): FaqEntry[] {
  switch (strategy.name) {
    case "details-summary":
      return fromDetails($);
    case "definition-list":
      return fromDefinitionList($);
    case "heading-answer":
      return fromHeadings($, strategy.questionSelector, strategy.answerSelector);
  }
}

/**
 * Split an FAQ page into question/answer pairs.
 * Returns an empty list when no strategy recognizes the layout.
 */
export function segmentFaq(
  html: string,
  strategies: FaqStrategy[] = FAQ_STRATEGIES
): FaqEntry[] {
  const $ = cheerio.load(html);
  $("script, style, noscript, nav, header, footer").remove();

  for (const strategy of strategies) {
    const pairs = runFaqStrategy($, strategy);
    if (pairs.length > 0) {
      const seen = new Set<string>();
      return pairs.filter((pair) => {
        if (seen.has(pair.question)) return false;
        seen.add(pair.question);
        return true;
      });
    }
  }
  return [];
}

interface FaqPage {
  faqs: FaqEntry[];
  text: string;
}

/**
 * Brand stage: about page prose plus FAQ pairs. An FAQ page that
 * cannot be segmented is kept as raw text.
 */
export async function extractBrandInfo(
  ctx: SiteContext
): Promise<StageOutput<BrandInfo>> {
  const [aboutCandidates, faqCandidates] = await Promise.all([
    ctx.discovery.candidateUrls("about"),
    ctx.discovery.candidateUrls("faq"),
  ]);

  const [about, faq] = await Promise.all([
    fetchFirstMatch(
      aboutCandidates,
      ctx.fetcher,
      ctx.logger,
      (page) => extractMainText(page.body) || null
    ),
    fetchFirstMatch<FaqPage>(
      faqCandidates,
      ctx.fetcher,
      ctx.logger,
      (page) => {
        const text = extractMainText(page.body);
        if (!text) return null;
        return { faqs: segmentFaq(page.body), text };
      }
    ),
  ]);

  const brandInfo: BrandInfo = { faqs: [] };
  const warnings: string[] = [];

  if (about) {
    ctx.logger("info", `Found brand context at ${about.url}`);
    brandInfo.about = about.value;
  } else {
    warnings.push("No about page found");
  }

  if (!faq) {
    warnings.push("No FAQ page found");
  } else if (faq.value.faqs.length > 0) {
    ctx.logger("info", `Found ${faq.value.faqs.length} FAQs at ${faq.url}`);
    brandInfo.faqs = faq.value.faqs;
  } else {
    warnings.push(
      `FAQ page at ${faq.url} has no recognizable question/answer layout; kept as text`
    );
    brandInfo.faq_text = faq.value.text;
  }

  return { success: true, data: brandInfo, warnings };
}
