/**
 * @lexcov/coverage -- the frequency-coverage engine.
 *
 * Normalization, counting, deterministic ranking and cumulative coverage,
 * plus the optional surface statistics computed over the same tokens.
 */
export { Normalizer } from "./normalizer.js";
export { countKeys, mergeTables, emptyTable } from "./frequency.js";
export { rankTable } from "./ranker.js";
export { coverageToPercentage, coverageToCount, coverageCurve } from "./coverage.js";
export { countSyllables, vowelSet, RUSSIAN_VOWELS, ENGLISH_VOWELS } from "./syllables.js";
export {
  textStatistics,
  partOfSpeechDistribution,
  lemmaForms,
  type StatisticsOptions,
} from "./statistics.js";
export { loadStopwords, parseStopwords, builtinStopwordLists } from "./stopwords.js";
export {
  analyzeTokens,
  analyzeText,
  analyzeDocument,
  coverageFor,
  type AnalysisOptions,
  type Analysis,
  type TextProfile,
} from "./pipeline.js";
