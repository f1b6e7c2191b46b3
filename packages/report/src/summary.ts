/**
 * Human-readable text analysis report.
 */
import type { CoverageReport } from "@lexcov/core";
import { coverageCurve, type Analysis } from "@lexcov/coverage";
import { posName } from "./pos-names.js";

function percent(x: number, digits = 2): string {
  return `${x.toFixed(digits)}%`;
}

function coverageHeadline(report: CoverageReport): string {
  const n = report.target.kind === "count" ? report.target.count : report.entries.length;
  return `  Coverage with top ${n} words: ${percent(report.coveragePercentage)}`;
}

/**
 * Render an analysis as the plain-text summary file: totals, most frequent
 * keys with their observed forms, part-of-speech distribution, coverage and
 * the longest words. Without a profile only the coverage sections appear.
 */
export function renderAnalysisSummary(analysis: Analysis): string {
  const { report, ranking, table, profile } = analysis;
  const out: string[] = ["=== Text Analysis Results ===", ""];

  if (profile) {
    const s = profile.statistics;
    out.push(
      `Total words: ${s.totalWords}`,
      `Unique words: ${s.uniqueWords}`,
      `Vocabulary richness: ${percent(s.vocabularyRichness * 100)}`,
      `Average word length: ${s.averageWordLength} characters`,
      `Average syllables per word: ${s.averageSyllables}`,
    );

    out.push("", "Most frequent lemmas (base forms):");
    for (const { key, forms } of profile.lemmaForms) {
      out.push(`  ${key} (${table.counts.get(key) ?? 0} occurrences)`);
      if (forms.length > 0) out.push(`    Word forms found: ${forms.join(", ")}`);
    }

    out.push("", "Parts of speech distribution:");
    if (profile.partsOfSpeech === null) {
      out.push("  (no morphology provider)");
    } else {
      for (const { pos, count } of profile.partsOfSpeech) {
        const share = s.totalWords > 0 ? (count / s.totalWords) * 100 : 0;
        out.push(`  ${posName(pos)}: ${count} (${percent(share, 1)})`);
      }
    }
  }

  out.push(
    "",
    "Word Coverage Analysis:",
    coverageHeadline(report),
    `  Total unique words: ${ranking.length}`,
    `  Total word occurrences: ${report.totalOccurrences}`,
  );

  out.push("", "Cumulative Coverage by Word Count:");
  for (const { rank, percentage } of coverageCurve(report)) {
    if (rank === 1 || rank % 10 === 0) {
      out.push(`  Top ${String(rank).padStart(3)} words: ${percent(percentage)}`);
    }
  }

  if (profile) {
    out.push("", "Longest words:");
    for (const word of profile.statistics.longestWords) {
      out.push(`  ${word} (${[...word].length} characters)`);
    }
  }

  return out.join("\n") + "\n";
}
