/**
 * Command: lexcov coverage
 *
 * Usage:
 *   lexcov coverage --input=book.epub --percentage=80
 *   lexcov coverage --input=book.txt --count=500 --out=top500.csv --format=full
 */
import { Effect } from "effect";
import { ConfigError } from "@lexcov/core";
import { analyzeDocument } from "@lexcov/coverage";
import { MorphologyFrom } from "@lexcov/effect-runtime";
import {
  defaultWordListPath,
  renderCoverageCsv,
  renderCoverageTable,
  renderWordListCsv,
  writeReport,
} from "@lexcov/report";
import { boolArg, loadConfig, parseKV, requireArg, strArg } from "../parse.js";
import { resolveMorphology, resolveStopwords, resolveTarget } from "../resolve.js";
import { runCommand } from "./run.js";

export async function coverageCmd(args: string[]): Promise<void> {
  const kv = await loadConfig(parseKV(args));
  const inputPath = requireArg(kv, "input", "path to a text, HTML or EPUB file");
  const target = resolveTarget(kv);
  const outPath = strArg(kv, "out", defaultWordListPath(inputPath));
  const format = strArg(kv, "format", "words");
  if (format !== "words" && format !== "full") {
    throw new ConfigError({ message: `--format must be "words" or "full", got "${format}"` });
  }

  const program = Effect.gen(function* () {
    const stopwords = yield* resolveStopwords(kv);
    const lemmatize = boolArg(kv, "lemmatize", false);
    // The lexicon is only needed for lemmatization.
    const morphology = lemmatize ? yield* resolveMorphology(kv) : null;

    const run = analyzeDocument(inputPath, { target, lemmatize, stopwords });
    const analysis = yield* (morphology === null ? run : Effect.provide(run, MorphologyFrom(morphology)));

    const csv = format === "full" ? renderCoverageCsv(analysis.report) : renderWordListCsv(analysis.report);
    yield* writeReport(outPath, csv);
    return analysis;
  });

  const analysis = await runCommand(kv, program);

  console.log();
  console.log(renderCoverageTable(analysis.report));
  console.log(`\nTop words have been saved to: ${outPath}`);
}
