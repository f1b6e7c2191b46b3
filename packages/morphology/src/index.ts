/**
 * @lexcov/morphology -- morphology providers for lemmatization and
 * part-of-speech lookup.
 */
export { DictionaryMorphology } from "./dictionary.js";
