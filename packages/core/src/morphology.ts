/**
 * Derived lookups over a morphology provider. Both read the first (most
 * likely) candidate analysis.
 */
import { Effect } from "effect";
import { NormalizationError } from "./errors.js";
import type { MorphologyProvider } from "./interfaces.js";
import type { CanonicalKey } from "./types.js";

/** Lemma of a lowercased token. A provider returning no candidates is an error. */
export function lemmaOf(
  morphology: MorphologyProvider,
  token: string,
): Effect.Effect<CanonicalKey, NormalizationError> {
  return Effect.flatMap(morphology.analyze(token), (analyses) => {
    const first = analyses[0];
    if (first === undefined) {
      return Effect.fail(
        new NormalizationError({
          message: `Morphology provider "${morphology.name}" returned no analysis`,
          token,
        }),
      );
    }
    return Effect.succeed(first.lemma);
  });
}

/** Part-of-speech label of a lowercased token, or null when it has none. */
export function partOfSpeechOf(
  morphology: MorphologyProvider,
  token: string,
): Effect.Effect<string | null, NormalizationError> {
  return Effect.map(morphology.analyze(token), (analyses) => analyses[0]?.pos ?? null);
}
