/**
 * Delimited-text word lists.
 */
import type { CoverageReport } from "@lexcov/core";

const NEEDS_QUOTES_RE = /[",\r\n]/;

/** Quote a CSV field when it contains a delimiter, quote or line break. */
export function csvField(value: string): string {
  return NEEDS_QUOTES_RE.test(value) ? `"${value.replace(/"/g, "\"\"")}"` : value;
}

export function csvRow(fields: readonly (string | number)[]): string {
  return fields.map((f) => csvField(String(f))).join(",");
}

/** One canonical key per line, in rank order, CRLF-terminated. */
export function renderWordListCsv(report: CoverageReport): string {
  return report.entries.map((e) => `${csvRow([e.key])}\r\n`).join("");
}

/** Key, count and cumulative percentage per line, with a header row. */
export function renderCoverageCsv(report: CoverageReport): string {
  const rows = [csvRow(["rank", "word", "count", "cumulative_percent"])];
  for (const e of report.entries) {
    rows.push(csvRow([e.rank, e.key, e.count, e.cumulativePercentage.toFixed(4)]));
  }
  return rows.map((r) => `${r}\r\n`).join("");
}
