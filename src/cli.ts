import { PageFetcher } from "./core/fetcher";
import { readStoreUrls } from "./core/file-reader";
import { Logger } from "./core/logger";
import {
  deduplicateUrls,
  formatDuration,
  getErrorMessage,
  runInBatches,
} from "./core/utils";
import { ScrapeFailure, ValidationError } from "./errors";
import {
  exportBatchErrors,
  exportInsightsJson,
  exportSummary,
  toInsightsExport,
} from "./exporter";
import { buildInsights } from "./orchestrator";
import {
  BatchError,
  BatchSummary,
  ExtractionResult,
  InsightsConfig,
  InsightsExport,
} from "./types";

export interface CliDeps {
  fetcher: PageFetcher;
  logger: Logger;
  /** Progress output; console.log when run from the terminal */
  print: (line: string) => void;
}

type BatchItemResult =
  | { success: true; data: InsightsExport }
  | { success: false; error: BatchError };

export function toBatchError(url: string, err: unknown): BatchError {
  const errorType: BatchError["error_type"] =
    err instanceof ValidationError
      ? "validation"
      : err instanceof ScrapeFailure
        ? "scrape_failure"
        : "unexpected";
  return { url, error_type: errorType, error_message: getErrorMessage(err) };
}

/**
 * Extract one store and write insights_<ts>.json.
 * Validation and scrape failures propagate to the caller.
 */
export async function runSingle(
  url: string,
  config: InsightsConfig,
  deps: CliDeps
): Promise<{ outputFile: string; insights: ExtractionResult }> {
  deps.print(`Step 1: Extracting insights from ${url}...`);
  const insights = await buildInsights(url, {
    fetcher: deps.fetcher,
    logger: deps.logger,
  });

  const policyCount = Object.keys(insights.policies).length;
  deps.print(`   ${insights.products.length} products, ${policyCount} policies`);
  for (const warning of insights.warnings) {
    deps.print(`   ! ${warning}`);
  }

  deps.print("\nStep 2: Exporting...");
  const outputFile = exportInsightsJson(
    toInsightsExport(url, insights),
    config.outputDir
  );
  deps.print(`   ${outputFile}`);
  return { outputFile, insights };
}

/**
 * Read store URLs from a CSV file and extract them in batches.
 * A failing store is recorded in errors_<ts>.csv and does not stop the run.
 */
export async function runBatch(
  config: InsightsConfig,
  deps: CliDeps
): Promise<BatchSummary> {
  const inputFile = config.inputFile;
  if (!inputFile) {
    throw new ValidationError("No input file given (use --input=<file.csv>)");
  }

  // ── Step 1: Load URLs ─────────────────────────────────────────────
  deps.print(`Step 1: Reading store URLs from ${inputFile}...`);
  const rawUrls = readStoreUrls(inputFile, config.urlColumn);
  deps.print(`   Found ${rawUrls.length} URLs`);

  const urls = deduplicateUrls(rawUrls);
  if (urls.length < rawUrls.length) {
    deps.print(`   After dedup: ${urls.length} unique URLs`);
  }

  // ── Step 2: Extract ───────────────────────────────────────────────
  deps.print(
    `\nStep 2: Extracting ${urls.length} stores (concurrency: ${config.concurrency})...`
  );
  const startTime = Date.now();

  const results = await runInBatches<string, BatchItemResult>(
    urls,
    config.concurrency,
    config.delayMs,
    async (url) => {
      try {
        const insights = await buildInsights(url, {
          fetcher: deps.fetcher,
          logger: deps.logger,
        });
        return { success: true, data: toInsightsExport(url, insights) };
      } catch (err) {
        return { success: false, error: toBatchError(url, err) };
      }
    },
    (completed, total, url, result) => {
      const icon = result.success ? "+" : "x";
      deps.print(`   [${completed}/${total}]  ${icon} ${url}`);
    }
  );

  const elapsed = Date.now() - startTime;

  const exports: InsightsExport[] = [];
  const errors: BatchError[] = [];
  for (const r of results) {
    if (r.success) exports.push(r.data);
    else errors.push(r.error);
  }

  // ── Step 3: Export ────────────────────────────────────────────────
  deps.print("\nStep 3: Exporting...");
  const outputFiles: string[] = [];

  const dataPath = exportInsightsJson(exports, config.outputDir);
  outputFiles.push(dataPath);
  deps.print(`   ${dataPath} (${exports.length} stores)`);

  if (errors.length > 0) {
    const errPath = exportBatchErrors(errors, config.outputDir);
    outputFiles.push(errPath);
    deps.print(`   ${errPath} (${errors.length} rows)`);
  }

  const successRate =
    urls.length > 0
      ? ((exports.length / urls.length) * 100).toFixed(1) + "%"
      : "0%";

  const summary: BatchSummary = {
    input_file: inputFile,
    total_urls_in_file: rawUrls.length,
    total_urls_after_dedup: urls.length,
    total_success: exports.length,
    total_errors: errors.length,
    success_rate: successRate,
    elapsed_time: formatDuration(elapsed),
    output_files: outputFiles,
    finished_at: new Date().toISOString(),
  };

  const summaryPath = exportSummary(summary, config.outputDir);
  deps.print(`   ${summaryPath}`);

  // ── Done ──────────────────────────────────────────────────────────
  deps.print(`\nDone in ${formatDuration(elapsed)}`);
  deps.print(`   Success: ${exports.length}/${urls.length} (${successRate})`);
  deps.print(`   Errors:  ${errors.length}/${urls.length}`);
  deps.print(`   Output:  ${config.outputDir}/`);

  return summary;
}
