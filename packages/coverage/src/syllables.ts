/**
 * Vowel-count syllable heuristic.
 *
 * One syllable per vowel letter holds well for Russian, where every vowel
 * is pronounced. It overcounts English diphthongs and silent e.
 */

export const RUSSIAN_VOWELS: ReadonlySet<string> = new Set("аеёиоуыэюя");
export const ENGLISH_VOWELS: ReadonlySet<string> = new Set("aeiouy");

/** Build a vowel set from a string of vowel characters. */
export function vowelSet(chars: string): ReadonlySet<string> {
  return new Set(chars.toLowerCase());
}

/** Number of characters of `word` (lowercased) in the vowel set. */
export function countSyllables(word: string, vowels: ReadonlySet<string> = RUSSIAN_VOWELS): number {
  let n = 0;
  for (const ch of word.toLowerCase()) {
    if (vowels.has(ch)) n++;
  }
  return n;
}
