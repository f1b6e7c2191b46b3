/**
 * Command: lexcov analyze
 *
 * Full text analysis: surface statistics, most frequent base forms with the
 * forms they were seen in, parts of speech and coverage of the top words.
 *
 * Usage:
 *   lexcov analyze --input=book.epub --dictionary=ru.tsv --out=analysis_results.txt
 */
import { Effect } from "effect";
import { ConfigError } from "@lexcov/core";
import { analyzeDocument } from "@lexcov/coverage";
import { MorphologyFrom } from "@lexcov/effect-runtime";
import { renderAnalysisSummary, writeReport } from "@lexcov/report";
import { boolArg, intArg, loadConfig, parseKV, requireArg, strArg } from "../parse.js";
import { resolveMorphology, resolveStopwords, resolveVowels } from "../resolve.js";
import { runCommand } from "./run.js";

export async function analyzeCmd(args: string[]): Promise<void> {
  const kv = await loadConfig(parseKV(args));
  const inputPath = requireArg(kv, "input", "path to a text, HTML or EPUB file");
  const outPath = strArg(kv, "out", "analysis_results.txt");
  const top = intArg(kv, "top", 100);
  if (top <= 0) {
    throw new ConfigError({ message: `--top must be a positive integer, got ${top}` });
  }
  const vowels = resolveVowels(kv);

  const program = Effect.gen(function* () {
    const stopwords = yield* resolveStopwords(kv);
    const morphology = yield* resolveMorphology(kv);
    // Lemmatize by default whenever a lexicon is available.
    const lemmatize = boolArg(kv, "lemmatize", morphology !== null);

    yield* Effect.logInfo("Analyzing text...");
    const run = analyzeDocument(inputPath, {
      target: { kind: "count", count: top },
      lemmatize,
      stopwords,
      profile: true,
      vowels,
      formsTop: top,
    });
    const analysis = yield* (morphology === null ? run : Effect.provide(run, MorphologyFrom(morphology)));

    yield* writeReport(outPath, renderAnalysisSummary(analysis));
  });

  await runCommand(kv, program);
  console.log(`\nAnalysis complete! Results saved to ${outPath}`);
}
