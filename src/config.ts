import * as path from "path";
import { parseLogLevel } from "./core/logger";
import { clampInt, DEFAULT_TIMEOUT_MS, HttpClientOptions } from "./core/utils";
import { InsightsConfig } from "./types";

export const DEFAULT_PORT = 8000;
export const DEFAULT_CONCURRENCY = 3;
export const DEFAULT_DELAY_MS = 500;

/**
 * Collect `--key=value` flags. Anything else on the command line is ignored.
 */
export function parseArgs(argv: string[]): Record<string, string> {
  const opts: Record<string, string> = {};
  for (const arg of argv) {
    const eqIdx = arg.indexOf("=");
    if (arg.startsWith("--") && eqIdx !== -1) {
      opts[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
    }
  }
  return opts;
}

/**
 * Merge CLI flags and environment into one InsightsConfig.
 * Flags win over the environment; numbers are clamped into range.
 */
export function loadConfig(argv: string[], env: NodeJS.ProcessEnv): InsightsConfig {
  const opts = parseArgs(argv);

  return {
    storeUrl: opts.url?.trim() || null,
    inputFile: opts.input?.trim() || null,
    urlColumn: opts.column?.trim() || null,
    concurrency: clampInt(opts.concurrency, DEFAULT_CONCURRENCY, 1, 10),
    delayMs: clampInt(opts.delay, DEFAULT_DELAY_MS, 0, 60_000),
    timeoutMs: clampInt(
      opts.timeout ?? env.FETCH_TIMEOUT_MS,
      DEFAULT_TIMEOUT_MS,
      1_000,
      60_000
    ),
    userAgent: env.USER_AGENT?.trim() || null,
    outputDir: path.resolve(opts.output || "./output"),
    port: clampInt(env.PORT, DEFAULT_PORT, 1, 65_535),
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}

export function toHttpOptions(config: InsightsConfig): HttpClientOptions {
  const options: HttpClientOptions = { timeoutMs: config.timeoutMs };
  if (config.userAgent) options.headers = { "User-Agent": config.userAgent };
  return options;
}
