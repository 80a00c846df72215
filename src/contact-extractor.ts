import * as cheerio from "cheerio";
import { extractPageText } from "./core/content";
import { cleanText } from "./core/utils";
import { fetchFirstMatch } from "./page-discovery";
import { loadHome, SiteContext } from "./site-context";
import { ContactInfo, SocialPlatform, StageOutput } from "./types";

const EMAIL_RE = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g;

/** Local parts and suffixes that are never a store's contact address */
const EXCLUDED_EMAIL_RE = /noreply|no-reply|admin|webmaster|\.(png|jpe?g|gif|webp|svg)$/i;

const PHONE_RE = /(?<![\d+])(?:\+\d{1,3}[\s.-]?)?\(?\d{3}\)?[\s.-]?\d{3}[\s.-]?\d{4}(?!\d)/g;

const ADDRESS_LABEL_RE = /^(our address|address|store location|location|office|visit us)\b\s*:?/i;

const SOCIAL_PLATFORMS: SocialPlatform[] = [
  "instagram",
  "facebook",
  "twitter",
  "tiktok",
  "youtube",
  "pinterest",
  "linkedin",
];

const SOCIAL_HOSTS: Record<SocialPlatform, string[]> = {
  instagram: ["instagram.com"],
  facebook: ["facebook.com", "fb.com"],
  twitter: ["twitter.com", "x.com"],
  tiktok: ["tiktok.com"],
  youtube: ["youtube.com", "youtu.be"],
  pinterest: ["pinterest.com"],
  linkedin: ["linkedin.com"],
};

/** Share buttons and intents point at the platform, not at the store */
const SHARE_PATH_RE = /^\/(sharer|share|intent|dialog|pin\/create|sharearticle|home)(\/|\.php|$)/i;

/** Path prefixes where the handle is the second segment */
const NESTED_HANDLE_PREFIXES = new Set([
  "channel",
  "c",
  "user",
  "company",
  "in",
  "pages",
]);

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

export interface SocialProfile {
  platform: SocialPlatform;
  url: string;
  handle: string;
}

/**
 * Recognize a social profile link and normalize it to
 * https://<host without www./m.><path without trailing slash>.
 * Returns null for other links and for share/intent endpoints.
 */
export function normalizeSocialUrl(href: string, baseUrl: string): SocialProfile | null {
  let url: URL;
  try {
    url = new URL(href.trim(), baseUrl);
  } catch {
    return null;
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") return null;

  const host = url.hostname.toLowerCase().replace(/^(www|m|mobile)\./, "");
  const platform = SOCIAL_PLATFORMS.find((name) =>
    SOCIAL_HOSTS[name].some((h) => host === h || host.endsWith(`.${h}`))
  );
  if (!platform) return null;

  const path = url.pathname.replace(/\/+$/, "");
  if (!path || SHARE_PATH_RE.test(path)) return null;

  const segments = path.split("/").filter(Boolean);
  const nested = NESTED_HANDLE_PREFIXES.has(segments[0].toLowerCase());
  const rawHandle = nested && segments[1] ? segments[1] : segments[0];

  return {
    platform,
    url: `https://${host}${path}`,
    handle: safeDecode(rawHandle).replace(/^@/, ""),
  };
}

/** Emails from visible text and mailto: links, lowercased, first-seen order. */
export function findEmails($: cheerio.CheerioAPI): string[] {
  const found: string[] = [];
  $('a[href^="mailto:"]').each((_, el) => {
    const address = ($(el).attr("href") ?? "").slice("mailto:".length).split("?")[0];
    found.push(...(address.match(EMAIL_RE) ?? []));
  });
  found.push(...(extractPageText($).match(EMAIL_RE) ?? []));

  const unique = new Set<string>();
  for (const email of found) {
    const normalized = email.toLowerCase();
    if (!EXCLUDED_EMAIL_RE.test(normalized)) unique.add(normalized);
  }
  return [...unique];
}

/** Phone numbers from tel: links and visible text, first-seen order. */
export function findPhones($: cheerio.CheerioAPI): string[] {
  const found: string[] = [];
  $('a[href^="tel:"]').each((_, el) => {
    const number = cleanText(($(el).attr("href") ?? "").slice("tel:".length));
    if (number) found.push(number);
  });
  found.push(...(extractPageText($).match(PHONE_RE) ?? []).map((p) => p.trim()));
  return [...new Set(found)];
}

/** A semantic <address>, else the first short block introduced by an address label. */
export function findAddress($: cheerio.CheerioAPI): string | undefined {
  const semantic = cleanText($("address").first().text());
  if (semantic.length > 20) return semantic;

  let address: string | undefined;
  $("p, li, div, span").each((_, el) => {
    const text = cleanText($(el).text());
    if (text.length > 20 && text.length <= 300 && ADDRESS_LABEL_RE.test(text)) {
      address = text;
      return false;
    }
    return undefined;
  });
  return address;
}

/** Social profiles linked from the page, deduplicated by normalized URL. */
export function findSocialProfiles(
  $: cheerio.CheerioAPI,
  baseUrl: string
): SocialProfile[] {
  const profiles: SocialProfile[] = [];
  const seen = new Set<string>();
  $("a[href]").each((_, el) => {
    const profile = normalizeSocialUrl($(el).attr("href") ?? "", baseUrl);
    if (profile && !seen.has(profile.url)) {
      seen.add(profile.url);
      profiles.push(profile);
    }
  });
  return profiles;
}

/**
 * Contact stage: emails, phones, address and social profiles from the
 * home page, merged with whatever a discovered contact page adds.
 */
export async function extractContact(
  ctx: SiteContext
): Promise<StageOutput<ContactInfo>> {
  const pages = [loadHome(ctx)];
  const warnings: string[] = [];

  const candidates = await ctx.discovery.candidateUrls("contact");
  const contactPage = await fetchFirstMatch(candidates, ctx.fetcher, ctx.logger, (page) =>
    page.body.trim() ? cheerio.load(page.body) : null
  );
  if (contactPage) {
    ctx.logger("info", `Found contact page at ${contactPage.url}`);
    pages.push(contactPage.value);
  } else {
    warnings.push("No contact page found");
  }

  const emails = [...new Set(pages.flatMap(findEmails))];
  const phones = [...new Set(pages.flatMap(findPhones))];
  const address = pages.map(findAddress).find((a) => a !== undefined);

  const profiles = pages.flatMap(($) => findSocialProfiles($, ctx.baseUrl));
  const socials = [...new Set(profiles.map((p) => p.url))];
  const socialHandles: ContactInfo["social_handles"] = {};
  for (const profile of profiles) {
    if (!socialHandles[profile.platform]) {
      socialHandles[profile.platform] = profile.handle;
    }
  }

  const contact: ContactInfo = {
    emails,
    phones,
    socials,
    social_handles: socialHandles,
  };
  if (emails.length > 0) contact.email = emails[0];
  if (address) contact.address = address;

  return { success: true, data: contact, warnings };
}
