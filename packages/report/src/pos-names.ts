/** Readable names for the OpenCorpora part-of-speech tags used by Russian lexicons. */
export const POS_NAMES: Readonly<Record<string, string>> = {
  NOUN: "Noun",
  VERB: "Verb",
  ADJF: "Adjective",
  ADJS: "Short Adjective",
  ADVB: "Adverb",
  PREP: "Preposition",
  CONJ: "Conjunction",
  PRTF: "Participle",
  PRTS: "Short Participle",
  INFN: "Infinitive",
  PRCL: "Particle",
  INTJ: "Interjection",
};

/** Readable name for a tag; unknown tags are shown as given. */
export function posName(tag: string): string {
  return Object.hasOwn(POS_NAMES, tag) ? POS_NAMES[tag] : tag;
}
