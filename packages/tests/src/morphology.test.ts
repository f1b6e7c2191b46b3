import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect } from "effect";
import { lemmaOf, partOfSpeechOf } from "@lexcov/core";
import { DictionaryMorphology } from "@lexcov/morphology";
import { englishLexicon, fakeMorphology } from "./helpers/fake-morphology.js";

const LEXICON = [
  "# form\tlemma\tpos",
  "cats\tcat\tNOUN",
  "saw\tsee\tVERB",
  "saw\tsaw\tNOUN",
  "",
  "Was\tbe",
].join("\n");

describe("DictionaryMorphology", () => {
  it("parses forms with candidates in file order", () => {
    const dict = Effect.runSync(DictionaryMorphology.parse(LEXICON));
    expect(dict.size).toBe(3);
    expect(Effect.runSync(dict.analyze("saw"))).toEqual([
      { lemma: "see", pos: "VERB" },
      { lemma: "saw", pos: "NOUN" },
    ]);
  });

  it("matches case-insensitively and allows a missing part of speech", () => {
    const dict = Effect.runSync(DictionaryMorphology.parse(LEXICON));
    expect(Effect.runSync(dict.analyze("WAS"))).toEqual([{ lemma: "be", pos: null }]);
  });

  it("analyses unknown words to themselves", () => {
    const dict = Effect.runSync(DictionaryMorphology.parse(LEXICON));
    expect(Effect.runSync(dict.analyze("Unknown"))).toEqual([{ lemma: "unknown", pos: null }]);
  });

  it("rejects malformed lines", () => {
    const err = Effect.runSync(Effect.flip(DictionaryMorphology.parse("cats\tcat\noops")));
    expect(err._tag).toBe("NormalizationError");
    expect(err.message).toBe('Invalid morphology lexicon <inline>: line 2: expected "form<TAB>lemma[<TAB>pos]"');
  });

  describe("load", () => {
    let dir: string;

    beforeAll(() => {
      dir = mkdtempSync(join(tmpdir(), "lexcov-morph-"));
      writeFileSync(join(dir, "lexicon.tsv"), LEXICON);
    });

    afterAll(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("loads a lexicon file", async () => {
      const dict = await Effect.runPromise(DictionaryMorphology.load(join(dir, "lexicon.tsv")));
      expect(Effect.runSync(dict.analyze("cats"))).toEqual([{ lemma: "cat", pos: "NOUN" }]);
    });

    it("fails when the lexicon is unavailable", async () => {
      const path = join(dir, "missing.tsv");
      const err = await Effect.runPromise(Effect.flip(DictionaryMorphology.load(path)));
      expect(err._tag).toBe("NormalizationError");
      expect(err.message).toBe(`Morphology lexicon "${path}" is unavailable`);
    });
  });
});

describe("lemmaOf / partOfSpeechOf", () => {
  const morph = fakeMorphology(englishLexicon);

  it("read the first candidate", () => {
    expect(Effect.runSync(lemmaOf(morph, "saw"))).toBe("see");
    expect(Effect.runSync(partOfSpeechOf(morph, "saw"))).toBe("VERB");
  });

  it("treat unknown words as their own lemma with no label", () => {
    expect(Effect.runSync(lemmaOf(morph, "zebra"))).toBe("zebra");
    expect(Effect.runSync(partOfSpeechOf(morph, "zebra"))).toBeNull();
  });
});
