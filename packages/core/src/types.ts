/**
 * Core types for the lexcov system.
 */

// ── Keys ───────────────────────────────────────────────────────────────────

/** Normalized identity a token is counted under. */
export type CanonicalKey = string;

// ── Frequency table ────────────────────────────────────────────────────────

/**
 * How ties between equal counts are ordered when ranking.
 * Tables built from one ordered stream remember first-seen order; merged
 * tables have no stream order left and fall back to lexicographic order.
 */
export type TieBreak = "first-seen" | "lexicographic";

export interface FrequencyTable {
  /** key -> occurrence count, every count >= 1. */
  readonly counts: ReadonlyMap<CanonicalKey, number>;
  /** key -> 0-based position of its first occurrence (first-seen tables only). */
  readonly firstSeen: ReadonlyMap<CanonicalKey, number> | null;
  readonly tieBreak: TieBreak;
  /** Sum of all counts. */
  readonly totalOccurrences: number;
  readonly distinctKeys: number;
}

// ── Ranking ────────────────────────────────────────────────────────────────
export interface RankedEntry {
  readonly key: CanonicalKey;
  readonly count: number;
  /** 1-based position, highest count first. */
  readonly rank: number;
}

// ── Coverage ───────────────────────────────────────────────────────────────
export type CoverageTarget =
  | { readonly kind: "percentage"; readonly percentage: number }
  | { readonly kind: "count"; readonly count: number };

export interface CoverageEntry extends RankedEntry {
  /** Share of all occurrences covered by ranks 1..rank, in [0, 100]. */
  readonly cumulativePercentage: number;
}

export interface CoverageReport {
  readonly target: CoverageTarget;
  readonly entries: readonly CoverageEntry[];
  readonly totalOccurrences: number;
  readonly distinctKeys: number;
  /** Cumulative percentage of the last entry, 0 when there are none. */
  readonly coveragePercentage: number;
}

export interface CoveragePoint {
  readonly rank: number;
  readonly percentage: number;
}

// ── Morphology ─────────────────────────────────────────────────────────────
export interface MorphAnalysis {
  readonly lemma: CanonicalKey;
  /** Part-of-speech label, null when the provider has none. */
  readonly pos: string | null;
}

// ── Surface statistics ─────────────────────────────────────────────────────
export interface TextStatistics {
  readonly totalWords: number;
  readonly uniqueWords: number;
  /** uniqueWords / totalWords, 0 for empty text. */
  readonly vocabularyRichness: number;
  readonly averageWordLength: number;
  readonly averageSyllables: number;
  readonly totalSyllables: number;
  readonly longestWords: readonly string[];
}

export interface PosCount {
  readonly pos: string;
  readonly count: number;
}

export interface LemmaForms {
  readonly key: CanonicalKey;
  readonly forms: readonly string[];
}

// ── Analysis config ────────────────────────────────────────────────────────
export interface NormalizerConfig {
  /** Replace each token with its lemma from the morphology provider. */
  readonly lemmatize: boolean;
  /** Canonical keys dropped from counting. Empty set disables exclusion. */
  readonly stopwords: ReadonlySet<string>;
}

export const defaultNormalizerConfig: NormalizerConfig = {
  lemmatize: false,
  stopwords: new Set<string>(),
};
