/**
 * Surface statistics: optional passes over the same token stream the
 * engine counts, independent of the coverage walk.
 */
import { Effect } from "effect";
import {
  partOfSpeechOf,
  type CanonicalKey,
  type LemmaForms,
  type MorphologyProvider,
  type NormalizationError,
  type PosCount,
  type TextStatistics,
} from "@lexcov/core";
import type { Normalizer } from "./normalizer.js";
import { countSyllables, RUSSIAN_VOWELS } from "./syllables.js";

export interface StatisticsOptions {
  readonly vowels?: ReadonlySet<string>;
  /** How many longest words to keep (default 10). */
  readonly longestWords?: number;
}

/** Length in code points, so astral letters count once. */
function charLength(word: string): number {
  return [...word].length;
}

function round2(x: number): number {
  return Math.round(x * 100) / 100;
}

/** Distinct values in first-seen order. */
function distinct(words: Iterable<string>): string[] {
  return [...new Set(words)];
}

/**
 * Word counts, richness, length and syllable averages over lowercased
 * surface tokens. Stopwords are not removed here.
 */
export function textStatistics(
  tokens: readonly string[],
  options: StatisticsOptions = {},
): TextStatistics {
  const vowels = options.vowels ?? RUSSIAN_VOWELS;
  const keep = options.longestWords ?? 10;
  const words = tokens.map((t) => t.toLowerCase());
  const total = words.length;

  let totalLength = 0;
  let totalSyllables = 0;
  for (const w of words) {
    totalLength += charLength(w);
    totalSyllables += countSyllables(w, vowels);
  }

  const unique = distinct(words);
  // stable sort: equal lengths keep first appearance
  const longest = [...unique].sort((a, b) => charLength(b) - charLength(a)).slice(0, keep);

  return {
    totalWords: total,
    uniqueWords: unique.length,
    vocabularyRichness: total > 0 ? unique.length / total : 0,
    averageWordLength: total > 0 ? round2(totalLength / total) : 0,
    averageSyllables: total > 0 ? round2(totalSyllables / total) : 0,
    totalSyllables,
    longestWords: longest,
  };
}

/**
 * Part-of-speech label counts from each token's first analysis, highest
 * first. Tokens the provider gives no label are skipped.
 */
export function partOfSpeechDistribution(
  tokens: readonly string[],
  morphology: MorphologyProvider,
): Effect.Effect<PosCount[], NormalizationError> {
  return Effect.gen(function* () {
    const labelOf = new Map<string, string | null>();
    const counts = new Map<string, number>();

    for (const token of tokens) {
      const word = token.toLowerCase();
      let pos = labelOf.get(word);
      if (pos === undefined) {
        pos = yield* partOfSpeechOf(morphology, word);
        labelOf.set(word, pos);
      }
      if (pos !== null) counts.set(pos, (counts.get(pos) ?? 0) + 1);
    }

    return [...counts]
      .map(([label, count]) => ({ pos: label, count }))
      .sort((a, b) => b.count - a.count);
  });
}

/**
 * Observed surface forms of each requested key, in first-seen order.
 * Keys with no matching form get an empty list.
 */
export function lemmaForms(
  tokens: readonly string[],
  keys: readonly CanonicalKey[],
  normalizer: Normalizer,
): Effect.Effect<LemmaForms[], NormalizationError> {
  return Effect.gen(function* () {
    const forms = new Map<CanonicalKey, string[]>();
    for (const key of keys) forms.set(key, []);

    for (const word of distinct(tokens.map((t) => t.toLowerCase()))) {
      const key = yield* normalizer.normalize(word);
      if (key === null) continue;
      forms.get(key)?.push(word);
    }

    return keys.map((key) => ({ key, forms: forms.get(key) ?? [] }));
  });
}
