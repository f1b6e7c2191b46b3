/**
 * Console rendering of a coverage report.
 */
import type { CoverageReport } from "@lexcov/core";

const RULE = "-".repeat(45);

function formatInt(n: number): string {
  return n.toLocaleString("en-US");
}

function heading(report: CoverageReport): string {
  const target = report.target;
  switch (target.kind) {
    case "percentage": return `Words accounting for ${target.percentage}% of the text:`;
    case "count": return `Top ${target.count} words cover ${report.coveragePercentage.toFixed(2)}% of the text:`;
  }
}

/**
 * Summary line, heading and one row per ranked word:
 *
 *   #  Word  Count  Cumulative %
 */
export function renderCoverageTable(report: CoverageReport): string {
  const lines = [
    `Analyzing text containing ${formatInt(report.totalOccurrences)} total words (${formatInt(report.distinctKeys)} unique words)`,
    heading(report),
    "",
    "#\tWord\t\tCount\t\tCumulative %",
    RULE,
  ];
  for (const e of report.entries) {
    lines.push(`${e.rank}\t${e.key.padEnd(15)}${String(e.count).padEnd(15)}${e.cumulativePercentage.toFixed(2)}%`);
  }
  return lines.join("\n");
}
