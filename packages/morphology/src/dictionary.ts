/**
 * Dictionary-backed morphology provider.
 *
 * Reads a tab-separated lexicon, one analysis per line:
 *
 *   form<TAB>lemma[<TAB>pos]
 *
 * Lines starting with `#` and blank lines are ignored. A form listed on
 * several lines has several candidates, most likely first (file order).
 * Forms missing from the lexicon analyse to themselves with no part of
 * speech.
 */
import { readFile } from "node:fs/promises";
import { Effect } from "effect";
import {
  NormalizationError,
  type MorphAnalysis,
  type MorphologyProvider,
} from "@lexcov/core";

export class DictionaryMorphology implements MorphologyProvider {
  readonly name = "dictionary";

  /** form -> candidates in file order */
  private readonly _entries = new Map<string, MorphAnalysis[]>();

  constructor(entries: Iterable<readonly [string, MorphAnalysis]> = []) {
    for (const [form, analysis] of entries) {
      const key = form.toLowerCase();
      const list = this._entries.get(key);
      if (list) list.push(analysis);
      else this._entries.set(key, [analysis]);
    }
  }

  /** Number of distinct forms in the lexicon. */
  get size(): number {
    return this._entries.size;
  }

  analyze(token: string): Effect.Effect<readonly MorphAnalysis[], NormalizationError> {
    const word = token.toLowerCase();
    return Effect.succeed(this._entries.get(word) ?? [{ lemma: word, pos: null }]);
  }

  // ── Construction from lexicon text ──────────────────────────────────────

  /** Parse lexicon text. `source` names the input in error messages. */
  static parse(text: string, source = "<inline>"): Effect.Effect<DictionaryMorphology, NormalizationError> {
    return Effect.try({
      try: () => {
        const entries: Array<[string, MorphAnalysis]> = [];
        const lines = text.split(/\r?\n/);
        for (let i = 0; i < lines.length; i++) {
          const line = lines[i].trim();
          if (line.length === 0 || line.startsWith("#")) continue;
          const [form, lemma, pos] = line.split("\t").map((f) => f.trim());
          if (!form || !lemma) {
            throw new Error(`line ${i + 1}: expected "form<TAB>lemma[<TAB>pos]"`);
          }
          entries.push([form, { lemma: lemma.toLowerCase(), pos: pos ? pos : null }]);
        }
        return new DictionaryMorphology(entries);
      },
      catch: (cause) =>
        new NormalizationError({
          message: `Invalid morphology lexicon ${source}: ${cause instanceof Error ? cause.message : String(cause)}`,
          cause,
        }),
    });
  }

  /** Load a lexicon file. A missing file fails the run. */
  static load(path: string): Effect.Effect<DictionaryMorphology, NormalizationError> {
    return Effect.flatMap(
      Effect.tryPromise({
        try: () => readFile(path, "utf-8"),
        catch: (cause) =>
          new NormalizationError({
            message: `Morphology lexicon "${path}" is unavailable`,
            cause,
          }),
      }),
      (text) => DictionaryMorphology.parse(text, `"${path}"`),
    );
  }
}
