import { describe, it, expect } from "vitest";
import {
  countKeys,
  rankTable,
  coverageToPercentage,
  coverageToCount,
  coverageCurve,
} from "@lexcov/coverage";

const ranked = rankTable(countKeys(["a", "a", "b", "c", "c", "c"]));

describe("coverageToPercentage", () => {
  it("stops at the entry that reaches the target", () => {
    const report = coverageToPercentage(ranked, 50);
    expect(report.target).toEqual({ kind: "percentage", percentage: 50 });
    expect(report.entries).toEqual([{ key: "c", count: 3, rank: 1, cumulativePercentage: 50 }]);
    expect(report.totalOccurrences).toBe(6);
    expect(report.distinctKeys).toBe(3);
    expect(report.coveragePercentage).toBe(50);
  });

  it("includes the entry that crosses the target", () => {
    const report = coverageToPercentage(ranked, 51);
    expect(report.entries.map((e) => e.key)).toEqual(["c", "a"]);
    expect(report.coveragePercentage).toBeCloseTo(83.333, 3);
  });

  it("covers the whole vocabulary at 100", () => {
    const report = coverageToPercentage(ranked, 100);
    expect(report.entries).toHaveLength(3);
    expect(report.coveragePercentage).toBe(100);
  });

  it("walks the whole vocabulary for targets above 100", () => {
    const report = coverageToPercentage(ranked, 150);
    expect(report.entries).toHaveLength(3);
    expect(report.coveragePercentage).toBe(100);
  });

  it("returns an empty report for non-positive targets", () => {
    for (const target of [0, -5]) {
      const report = coverageToPercentage(ranked, target);
      expect(report.entries).toEqual([]);
      expect(report.coveragePercentage).toBe(0);
      expect(report.totalOccurrences).toBe(6);
    }
  });

  it("returns an empty report for empty input", () => {
    const report = coverageToPercentage([], 80);
    expect(report.entries).toEqual([]);
    expect(report.totalOccurrences).toBe(0);
    expect(report.distinctKeys).toBe(0);
    expect(report.coveragePercentage).toBe(0);
  });
});

describe("coverageToCount", () => {
  it("takes the top entries with their cumulative percentage", () => {
    const report = coverageToCount(ranked, 2);
    expect(report.target).toEqual({ kind: "count", count: 2 });
    expect(report.entries.map((e) => [e.key, e.count])).toEqual([["c", 3], ["a", 2]]);
    expect(report.entries[0].cumulativePercentage).toBe(50);
    expect(report.entries[1].cumulativePercentage).toBeCloseTo(83.333, 3);
  });

  it("stops at the end of the ranking", () => {
    expect(coverageToCount(ranked, 10).entries).toHaveLength(3);
  });

  it("returns an empty report for non-positive counts and empty input", () => {
    expect(coverageToCount(ranked, 0).entries).toEqual([]);
    expect(coverageToCount(ranked, -1).entries).toEqual([]);
    const empty = coverageToCount([], 5);
    expect(empty.entries).toEqual([]);
    expect(empty.totalOccurrences).toBe(0);
  });

  it("exposes the coverage curve", () => {
    const curve = coverageCurve(coverageToCount(ranked, 3));
    expect(curve.map((p) => p.rank)).toEqual([1, 2, 3]);
    expect(curve[0].percentage).toBe(50);
    expect(curve[2].percentage).toBe(100);
  });
});

describe("coverage properties", () => {
  const text =
    "the quick brown fox jumps over the lazy dog the dog barks and the fox runs away from the dog";
  const ranking = rankTable(countKeys(text.split(" ")));

  it("percentage mode reaches the target with the last entry only", () => {
    for (const target of [1, 10, 25, 33.3, 50, 75, 90, 99, 100]) {
      const { entries } = coverageToPercentage(ranking, target);
      const last = entries[entries.length - 1];
      expect(last.cumulativePercentage).toBeGreaterThanOrEqual(target);
      if (entries.length > 1) {
        expect(entries[entries.length - 2].cumulativePercentage).toBeLessThan(target);
      }
      if (entries.length < ranking.length) {
        const withNext = coverageToCount(ranking, entries.length + 1).coveragePercentage;
        expect(last.cumulativePercentage).toBeLessThan(withNext);
      }
    }
  });

  it("count mode agrees with percentage mode at the same threshold", () => {
    for (let n = 1; n <= ranking.length; n++) {
      const byCount = coverageToCount(ranking, n);
      expect(byCount.entries).toHaveLength(n);
      const byPct = coverageToPercentage(ranking, byCount.coveragePercentage);
      expect(byPct.coveragePercentage).toBe(byCount.coveragePercentage);
      expect(byPct.entries).toHaveLength(n);
    }
  });

  it("cumulative percentage never decreases", () => {
    const { entries } = coverageToCount(ranking, ranking.length);
    for (let i = 1; i < entries.length; i++) {
      expect(entries[i].cumulativePercentage).toBeGreaterThanOrEqual(entries[i - 1].cumulativePercentage);
    }
  });
});

describe("exact percentage boundaries", () => {
  function keysWith(heads: ReadonlyArray<readonly [string, number]>, total: number): string[] {
    const keys: string[] = [];
    for (const [key, n] of heads) keys.push(...Array<string>(n).fill(key));
    for (let i = keys.length; i < total; i++) keys.push(`w${i}`);
    return keys;
  }

  const ranking = rankTable(countKeys(keysWith([["a", 29], ["b", 28]], 100)));

  it("stops at the entry whose share equals the target", () => {
    const at29 = coverageToPercentage(ranking, 29);
    expect(at29.entries.map((e) => e.key)).toEqual(["a"]);
    expect(at29.coveragePercentage).toBe(29);

    const at57 = coverageToPercentage(ranking, 57);
    expect(at57.entries.map((e) => e.key)).toEqual(["a", "b"]);
    expect(at57.coveragePercentage).toBe(57);

    const small = rankTable(countKeys(keysWith([["x", 7]], 100)));
    const at7 = coverageToPercentage(small, 7);
    expect(at7.entries).toEqual([{ key: "x", count: 7, rank: 1, cumulativePercentage: 7 }]);
  });

  it("stores exact percentages for integer shares", () => {
    const { entries } = coverageToCount(rankTable(countKeys(keysWith([["a", 56]], 100))), 2);
    expect(entries.map((e) => e.cumulativePercentage)).toEqual([56, 57]);
  });

  it("count mode agrees with percentage mode at every rank", () => {
    for (let n = 1; n <= ranking.length; n++) {
      const byCount = coverageToCount(ranking, n);
      const byPct = coverageToPercentage(ranking, byCount.coveragePercentage);
      expect(byPct.entries).toHaveLength(n);
    }
  });
});
