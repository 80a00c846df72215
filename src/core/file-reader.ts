import * as fs from "fs";
import * as path from "path";
import { ValidationError } from "../errors";

/** Header names recognized as the store URL column, in priority order */
const URL_COLUMN_NAMES = [
  "url",
  "website_url",
  "website",
  "store_url",
  "store",
  "domain",
  "shop",
  "link",
];

/**
 * Read store URLs from a CSV file. Cells are returned trimmed and
 * unvalidated: bare domains such as "acme.com" are fine, and anything
 * unusable is reported per URL when the batch runs.
 * @param columnName  Optional header name of the URL column.
 */
export function readStoreUrls(filePath: string, columnName?: string | null): string[] {
  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".csv") {
    throw new ValidationError(`Unsupported file type "${ext}". Only .csv is supported.`);
  }

  const raw = fs.readFileSync(filePath, "utf-8");
  // Strip BOM if present
  const content = raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;

  const lines = content.split(/\r?\n/).filter((l) => l.trim() !== "");
  if (lines.length === 0) {
    throw new ValidationError(`File "${filePath}" is empty.`);
  }

  const headers = parseCsvRow(lines[0]);
  const colIdx = findUrlColumn(headers, columnName);

  const urls: string[] = [];
  for (const line of lines.slice(1)) {
    const cell = (parseCsvRow(line)[colIdx] ?? "").trim();
    if (cell) urls.push(cell);
  }
  return urls;
}

// ── Internals ───────────────────────────────────────────────────────

function findUrlColumn(headers: string[], preferred?: string | null): number {
  const normalized = headers.map((h) => h.trim().toLowerCase());

  if (preferred) {
    const idx = normalized.indexOf(preferred.trim().toLowerCase());
    if (idx === -1) {
      const available = headers.map((h) => `"${h}"`).join(", ");
      throw new ValidationError(
        `Column "${preferred}" not found. Available headers: ${available}`
      );
    }
    return idx;
  }

  for (const name of URL_COLUMN_NAMES) {
    const idx = normalized.indexOf(name);
    if (idx !== -1) return idx;
  }

  const present = headers.map((h) => `"${h}"`).join(", ");
  throw new ValidationError(
    `No store URL column found. Headers present: ${present}. ` +
      `Re-run with --column=<name> to pick one.`
  );
}

/** Minimal CSV row parser: handles quoted fields and "" escaped quotes. */
export function parseCsvRow(line: string): string[] {
  const fields: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inQuotes) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === ",") {
      fields.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  fields.push(current);
  return fields;
}
