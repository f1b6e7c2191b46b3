import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import { Normalizer } from "@lexcov/coverage";
import type { MorphologyProvider } from "@lexcov/core";
import { englishLexicon, failingMorphology, fakeMorphology } from "./helpers/fake-morphology.js";

const morphology = fakeMorphology(englishLexicon);

describe("Normalizer", () => {
  it("lowercases tokens", () => {
    const normalizer = Effect.runSync(Normalizer.make());
    expect(Effect.runSync(normalizer.normalize("Hello"))).toBe("hello");
  });

  it("drops stopwords", () => {
    const normalizer = Effect.runSync(Normalizer.make({ stopwords: new Set(["the"]) }));
    expect(Effect.runSync(normalizer.normalize("The"))).toBeNull();
    expect(Effect.runSync(normalizer.normalizeAll(["The", "cat", "the", "end"]))).toEqual(["cat", "end"]);
  });

  it("takes the first lemma candidate", () => {
    const normalizer = Effect.runSync(Normalizer.make({ lemmatize: true }, morphology));
    expect(Effect.runSync(normalizer.normalize("Saw"))).toBe("see");
    expect(Effect.runSync(normalizer.normalize("Cats"))).toBe("cat");
    expect(Effect.runSync(normalizer.normalize("bird"))).toBe("bird");
  });

  it("checks stopwords against the lemma", () => {
    const normalizer = Effect.runSync(
      Normalizer.make({ lemmatize: true, stopwords: new Set(["be"]) }, morphology),
    );
    expect(Effect.runSync(normalizer.normalizeAll(["Was", "cats", "is"]))).toEqual(["cat"]);
  });

  it("ignores the provider when lemmatization is off", () => {
    const normalizer = Effect.runSync(Normalizer.make({ lemmatize: false }, morphology));
    expect(Effect.runSync(normalizer.normalize("cats"))).toBe("cats");
  });

  it("fails when lemmatization has no provider", () => {
    const err = Effect.runSync(Effect.flip(Normalizer.make({ lemmatize: true })));
    expect(err._tag).toBe("NormalizationError");
  });

  it("fails the run when the provider fails", () => {
    const normalizer = Effect.runSync(Normalizer.make({ lemmatize: true }, failingMorphology));
    const err = Effect.runSync(Effect.flip(normalizer.normalizeAll(["one", "two"])));
    expect(err._tag).toBe("NormalizationError");
    expect(err.token).toBe("one");
  });

  it("fails when the provider returns no candidates", () => {
    const empty: MorphologyProvider = { name: "empty", analyze: () => Effect.succeed([]) };
    const normalizer = Effect.runSync(Normalizer.make({ lemmatize: true }, empty));
    const err = Effect.runSync(Effect.flip(normalizer.normalize("word")));
    expect(err.message).toBe('Morphology provider "empty" returned no analysis');
    expect(err.token).toBe("word");
  });
});
