import { Effect } from "effect";
import {
  NormalizationError,
  type MorphAnalysis,
  type MorphologyProvider,
} from "@lexcov/core";

/** In-memory provider; words missing from `lexicon` analyse to themselves. */
export function fakeMorphology(lexicon: Record<string, MorphAnalysis[]>): MorphologyProvider {
  const entries = new Map(Object.entries(lexicon));
  return {
    name: "fake",
    analyze: (token) => Effect.succeed(entries.get(token) ?? [{ lemma: token, pos: null }]),
  };
}

/** Provider whose every lookup fails, as an unavailable backend would. */
export const failingMorphology: MorphologyProvider = {
  name: "failing",
  analyze: (token) =>
    Effect.fail(new NormalizationError({ message: "morphology backend is down", token })),
};

export const englishLexicon: Record<string, MorphAnalysis[]> = {
  cats: [{ lemma: "cat", pos: "NOUN" }],
  cat: [{ lemma: "cat", pos: "NOUN" }],
  dogs: [{ lemma: "dog", pos: "NOUN" }],
  saw: [
    { lemma: "see", pos: "VERB" },
    { lemma: "saw", pos: "NOUN" },
  ],
  was: [{ lemma: "be", pos: "VERB" }],
  is: [{ lemma: "be", pos: "VERB" }],
  run: [{ lemma: "run", pos: "VERB" }],
};
