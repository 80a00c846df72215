import { extractMainText } from "./core/content";
import { fetchFirstMatch } from "./page-discovery";
import { SiteContext } from "./site-context";
import { PolicyKind, PolicySet, StageOutput } from "./types";

/** Output order of the policy map */
export const POLICY_KINDS: PolicyKind[] = ["privacy", "returns", "shipping", "terms"];

/**
 * Locate one policy page and reduce it to clean prose.
 * Null when no candidate answered with usable text.
 */
async function findPolicy(
  ctx: SiteContext,
  kind: PolicyKind
): Promise<{ url: string; text: string } | null> {
  const candidates = await ctx.discovery.candidateUrls(kind);
  const hit = await fetchFirstMatch(
    candidates,
    ctx.fetcher,
    ctx.logger,
    (page) => extractMainText(page.body) || null
  );
  return hit ? { url: hit.url, text: hit.value } : null;
}

/**
 * Policy stage. Kinds are looked up concurrently; a kind with no page is
 * left out of the map rather than set to an empty string.
 */
export async function extractPolicies(
  ctx: SiteContext
): Promise<StageOutput<PolicySet>> {
  const found = await Promise.all(
    POLICY_KINDS.map((kind) => findPolicy(ctx, kind))
  );

  const policies: PolicySet = {};
  const warnings: string[] = [];

  POLICY_KINDS.forEach((kind, i) => {
    const hit = found[i];
    if (hit) {
      ctx.logger("info", `Found ${kind} policy at ${hit.url}`);
      policies[kind] = hit.text;
    } else {
      warnings.push(`No ${kind} policy page found`);
    }
  });

  return { success: true, data: policies, warnings };
}
