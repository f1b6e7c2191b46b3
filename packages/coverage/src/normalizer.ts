/**
 * Token normalization: lowercase, optional lemma lookup, optional stopword exclusion.
 *
 * The order is fixed: the stopword check runs on the final key, so with
 * lemmatization on a stopword list of base forms drops every inflected form.
 */
import { Effect } from "effect";
import {
  NormalizationError,
  defaultNormalizerConfig,
  lemmaOf,
  type CanonicalKey,
  type MorphologyProvider,
  type NormalizerConfig,
} from "@lexcov/core";

export class Normalizer {
  readonly config: NormalizerConfig;
  private readonly _morphology: MorphologyProvider | null;

  private constructor(config: NormalizerConfig, morphology: MorphologyProvider | null) {
    this.config = config;
    this._morphology = morphology;
  }

  /**
   * Build a normalizer for one analysis run.
   *
   * Lemmatization without a provider fails here instead of degrading to
   * surface-form counting.
   */
  static make(
    config: Partial<NormalizerConfig> = {},
    morphology: MorphologyProvider | null = null,
  ): Effect.Effect<Normalizer, NormalizationError> {
    const resolved: NormalizerConfig = { ...defaultNormalizerConfig, ...config };
    if (resolved.lemmatize && morphology === null) {
      return Effect.fail(
        new NormalizationError({
          message: "Lemmatization is enabled but no morphology provider is available",
        }),
      );
    }
    return Effect.succeed(new Normalizer(resolved, resolved.lemmatize ? morphology : null));
  }

  /** Canonical key for one token, or null when it is a stopword. */
  normalize(token: string): Effect.Effect<CanonicalKey | null, NormalizationError> {
    const lower = token.toLowerCase();
    const morphology = this._morphology;
    const key = morphology === null ? Effect.succeed(lower) : lemmaOf(morphology, lower);
    return Effect.map(key, (k) => (this.config.stopwords.has(k) ? null : k));
  }

  /** Normalize a token stream in order, dropping stopwords. */
  normalizeAll(tokens: Iterable<string>): Effect.Effect<CanonicalKey[], NormalizationError> {
    const self = this;
    return Effect.gen(function* () {
      const keys: CanonicalKey[] = [];
      for (const token of tokens) {
        const key = yield* self.normalize(token);
        if (key !== null) keys.push(key);
      }
      return keys;
    });
  }
}
