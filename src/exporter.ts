import * as fs from "fs";
import * as path from "path";
import { BatchError, BatchSummary, ExtractionResult, InsightsExport } from "./types";

/** UTF-8 BOM for Excel compatibility */
const BOM = "\uFEFF";

/** Generate a filename with a timestamp suffix to avoid overwriting old runs. */
export function timestampedPath(
  outputDir: string,
  base: string,
  ext: string,
  now: Date = new Date()
): string {
  const ts = now
    .toISOString()
    .replace(/[-:]/g, "")
    .replace("T", "_")
    .slice(0, 15); // "20260224_143022"
  return path.join(outputDir, `${base}_${ts}${ext}`);
}

/**
 * Escape a value for safe inclusion in a CSV cell.
 * Wraps in double quotes if the value contains commas, quotes, or newlines.
 */
export function escapeCsv(value: string | number | null): string {
  const str = value == null ? "" : String(value);
  if (/[",\r\n]/.test(str)) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

interface CsvColumn<T> {
  key: keyof T & string;
  format?: (val: T[keyof T]) => string;
}

/**
 * Convert rows to a CSV string with a header row.
 * @param columns - Ordered column definitions with key and optional formatter
 */
export function toCsv<T>(rows: T[], columns: CsvColumn<T>[]): string {
  const header = columns.map((c) => escapeCsv(c.key)).join(",");
  const lines = rows.map((row) =>
    columns
      .map((col) => {
        const raw = row[col.key];
        return escapeCsv(col.format ? col.format(raw) : String(raw ?? ""));
      })
      .join(",")
  );
  return BOM + [header, ...lines].join("\n") + "\n";
}

const ERROR_COLUMNS: CsvColumn<BatchError>[] = [
  { key: "url" },
  { key: "error_type" },
  { key: "error_message" },
];

/** Wrap one result the way it is written to disk. */
export function toInsightsExport(
  sourceUrl: string,
  insights: ExtractionResult,
  now: Date = new Date()
): InsightsExport {
  return { scraped_at: now.toISOString(), source_url: sourceUrl, insights };
}

/**
 * Write one export, or a batch of them as a JSON array, to insights_<ts>.json.
 * @returns Path to the written file
 */
export function exportInsightsJson(
  data: InsightsExport | InsightsExport[],
  outputDir: string
): string {
  fs.mkdirSync(outputDir, { recursive: true });
  const filePath = timestampedPath(outputDir, "insights", ".json");
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2) + "\n", "utf-8");
  return filePath;
}

/**
 * Export store URLs that failed in batch mode to errors_<ts>.csv.
 * @returns Path to the written file
 */
export function exportBatchErrors(errors: BatchError[], outputDir: string): string {
  fs.mkdirSync(outputDir, { recursive: true });
  const filePath = timestampedPath(outputDir, "errors", ".csv");
  fs.writeFileSync(filePath, toCsv(errors, ERROR_COLUMNS), "utf-8");
  return filePath;
}

/** Write batch statistics to summary_<ts>.json. */
export function exportSummary(summary: BatchSummary, outputDir: string): string {
  fs.mkdirSync(outputDir, { recursive: true });
  const filePath = timestampedPath(outputDir, "summary", ".json");
  fs.writeFileSync(filePath, JSON.stringify(summary, null, 2) + "\n", "utf-8");
  return filePath;
}
