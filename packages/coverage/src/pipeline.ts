/**
 * The analysis pipeline: reader -> tokenizer -> normalizer -> counter ->
 * ranker -> coverage, with optional surface statistics.
 *
 * Collaborators come from Effect services: the document reader for
 * `analyzeDocument`, and the morphology provider, which is only required
 * when lemmatization is on.
 */
import { Effect, Option } from "effect";
import {
  DocumentReaderService,
  MorphologyService,
  type CoverageReport,
  type CoverageTarget,
  type FrequencyTable,
  type InputError,
  type LemmaForms,
  type NormalizationError,
  type PosCount,
  type RankedEntry,
  type TextStatistics,
} from "@lexcov/core";
import { tokenize } from "@lexcov/ingest";
import { withSpan } from "@lexcov/effect-runtime";
import { Normalizer } from "./normalizer.js";
import { countKeys } from "./frequency.js";
import { rankTable } from "./ranker.js";
import { coverageToCount, coverageToPercentage } from "./coverage.js";
import { lemmaForms, partOfSpeechDistribution, textStatistics } from "./statistics.js";

export interface AnalysisOptions {
  readonly target: CoverageTarget;
  readonly lemmatize?: boolean;
  readonly stopwords?: ReadonlySet<string>;
  /** Also compute surface statistics, parts of speech and lemma forms. */
  readonly profile?: boolean;
  readonly vowels?: ReadonlySet<string>;
  /** Ranks whose observed forms are collected when profiling (default 100). */
  readonly formsTop?: number;
}

export interface TextProfile {
  readonly statistics: TextStatistics;
  /** Null when no morphology provider is available. */
  readonly partsOfSpeech: readonly PosCount[] | null;
  readonly lemmaForms: readonly LemmaForms[];
}

export interface Analysis {
  /** Surface tokens before normalization. */
  readonly tokenCount: number;
  readonly table: FrequencyTable;
  readonly ranking: readonly RankedEntry[];
  readonly report: CoverageReport;
  readonly profile: TextProfile | null;
}

/** Coverage report for either kind of target. */
export function coverageFor(ranking: readonly RankedEntry[], target: CoverageTarget): CoverageReport {
  switch (target.kind) {
    case "percentage": return coverageToPercentage(ranking, target.percentage);
    case "count": return coverageToCount(ranking, target.count);
  }
}

/** Run the engine over an already tokenized stream. */
export function analyzeTokens(
  tokens: readonly string[],
  options: AnalysisOptions,
): Effect.Effect<Analysis, NormalizationError> {
  return Effect.gen(function* () {
    const morphology = Option.getOrNull(yield* Effect.serviceOption(MorphologyService));
    const normalizer = yield* Normalizer.make(
      {
        lemmatize: options.lemmatize ?? false,
        stopwords: options.stopwords ?? new Set<string>(),
      },
      morphology,
    );

    const keys = yield* withSpan("normalize", normalizer.normalizeAll(tokens));
    yield* Effect.logDebug(`normalized ${tokens.length} tokens -> ${keys.length} keys`);

    const table = countKeys(keys);
    const ranking = rankTable(table);
    yield* Effect.logDebug(`counted ${table.totalOccurrences} occurrences of ${table.distinctKeys} keys`);

    const report = coverageFor(ranking, options.target);
    yield* Effect.logDebug(
      `coverage ${report.coveragePercentage.toFixed(2)}% with ${report.entries.length} keys`,
    );

    let profile: TextProfile | null = null;
    if (options.profile) {
      const top = ranking.slice(0, options.formsTop ?? 100).map((e) => e.key);
      const statistics = textStatistics(tokens, { vowels: options.vowels });
      let partsOfSpeech: PosCount[] | null = null;
      if (morphology !== null) {
        partsOfSpeech = yield* withSpan("partsOfSpeech", partOfSpeechDistribution(tokens, morphology));
      }
      const forms = yield* withSpan("lemmaForms", lemmaForms(tokens, top, normalizer));
      profile = { statistics, partsOfSpeech, lemmaForms: forms };
    }

    return { tokenCount: tokens.length, table, ranking, report, profile };
  });
}

/** Tokenize raw text and analyse it. */
export function analyzeText(
  text: string,
  options: AnalysisOptions,
): Effect.Effect<Analysis, NormalizationError> {
  return withSpan("analyzeText", analyzeTokens(tokenize(text), options));
}

/** Read a document through the reader service and analyse it. */
export function analyzeDocument(
  path: string,
  options: AnalysisOptions,
): Effect.Effect<Analysis, InputError | NormalizationError, DocumentReaderService> {
  return Effect.gen(function* () {
    const reader = yield* DocumentReaderService;
    yield* Effect.logInfo(`Reading ${path} (${reader.name})`);
    const text = yield* withSpan("read", reader.read(path));
    return yield* analyzeText(text, options);
  });
}
