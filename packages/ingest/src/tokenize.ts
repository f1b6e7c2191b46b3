/**
 * Word tokenizer for natural-language text.
 *
 * Splits on every run of characters that is neither a letter nor a digit
 * (apostrophes and hyphens included), then drops tokens without a letter.
 */

const BOUNDARY_RE = /[^\p{L}\p{M}\p{N}]+/u;
const LETTER_RE = /\p{L}/u;

/** Tokens in text order. Case is preserved; normalization lowercases. */
export function tokenize(text: string): string[] {
  return text.split(BOUNDARY_RE).filter((t) => t.length > 0 && LETTER_RE.test(t));
}
