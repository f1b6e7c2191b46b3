/**
 * Cumulative coverage over a ranking.
 *
 * Both modes share one walk: add each entry's count to a running sum and
 * express it as a share of all occurrences. Percentages stay unrounded;
 * rounding is a rendering concern.
 */
import type {
  CoverageEntry,
  CoveragePoint,
  CoverageReport,
  CoverageTarget,
  RankedEntry,
} from "@lexcov/core";

function totalOf(ranked: readonly RankedEntry[]): number {
  let total = 0;
  for (const e of ranked) total += e.count;
  return total;
}

function buildReport(
  target: CoverageTarget,
  entries: readonly CoverageEntry[],
  totalOccurrences: number,
  distinctKeys: number,
): CoverageReport {
  const last = entries[entries.length - 1];
  return {
    target,
    entries,
    totalOccurrences,
    distinctKeys,
    coveragePercentage: last === undefined ? 0 : last.cumulativePercentage,
  };
}

/**
 * Walk the ranking, stopping after the entry for which `done` first holds
 * (or at the end of the ranking).
 */
function walk(
  ranked: readonly RankedEntry[],
  total: number,
  done: (cumulativePercentage: number, taken: number) => boolean,
): CoverageEntry[] {
  const entries: CoverageEntry[] = [];
  let running = 0;
  for (const e of ranked) {
    running += e.count;
    // scale before dividing: 29/100 must give exactly 29, not 28.999...
    const cumulativePercentage = (running * 100) / total;
    entries.push({ key: e.key, count: e.count, rank: e.rank, cumulativePercentage });
    if (done(cumulativePercentage, entries.length)) break;
  }
  return entries;
}

/**
 * Smallest prefix of the ranking whose cumulative percentage reaches
 * `targetPct`, including the entry that crosses it.
 *
 * A non-positive target or an empty ranking gives an empty report. Targets
 * above 100 cover the whole vocabulary.
 */
export function coverageToPercentage(
  ranked: readonly RankedEntry[],
  targetPct: number,
): CoverageReport {
  const target: CoverageTarget = { kind: "percentage", percentage: targetPct };
  const total = totalOf(ranked);
  if (!(targetPct > 0) || total === 0) {
    return buildReport(target, [], total, ranked.length);
  }
  const entries = walk(ranked, total, (pct) => pct >= targetPct);
  return buildReport(target, entries, total, ranked.length);
}

/**
 * The top `min(targetCount, ranked.length)` entries with the coverage each
 * rank position reaches.
 */
export function coverageToCount(
  ranked: readonly RankedEntry[],
  targetCount: number,
): CoverageReport {
  const target: CoverageTarget = { kind: "count", count: targetCount };
  const total = totalOf(ranked);
  const limit = Math.floor(targetCount);
  if (!(limit > 0) || total === 0) {
    return buildReport(target, [], total, ranked.length);
  }
  const entries = walk(ranked, total, (_pct, taken) => taken >= limit);
  return buildReport(target, entries, total, ranked.length);
}

/** Coverage growth curve: one point per rank in the report. */
export function coverageCurve(report: CoverageReport): CoveragePoint[] {
  return report.entries.map((e) => ({ rank: e.rank, percentage: e.cumulativePercentage }));
}
