import * as cheerio from "cheerio";
import { PageFetcher } from "./core/fetcher";
import { Logger } from "./core/logger";
import { PageDiscovery } from "./page-discovery";

/**
 * Read-only inputs shared by every extraction stage of one request.
 * Stages load their own cheerio document from `homeHtml` so none can
 * mutate what another stage sees.
 */
export interface SiteContext {
  baseUrl: string;
  homeHtml: string;
  fetcher: PageFetcher;
  logger: Logger;
  discovery: PageDiscovery;
}

/** `homeUrl` is where the home page was finally served from */
export function createSiteContext(
  baseUrl: string,
  homeHtml: string,
  fetcher: PageFetcher,
  logger: Logger,
  homeUrl: string = baseUrl
): SiteContext {
  return {
    baseUrl,
    homeHtml,
    fetcher,
    logger,
    discovery: new PageDiscovery(baseUrl, homeHtml, fetcher, logger, homeUrl),
  };
}

export function loadHome(ctx: SiteContext): cheerio.CheerioAPI {
  return cheerio.load(ctx.homeHtml);
}
