/**
 * Deterministic ranking of a frequency table.
 */
import type { CanonicalKey, FrequencyTable, RankedEntry } from "@lexcov/core";

/** Lexicographic order by UTF-16 code unit, independent of locale. */
function compareKeys(a: CanonicalKey, b: CanonicalKey): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Order keys by count, highest first.
 *
 * Equal counts keep first-seen stream order when the table tracks it and
 * fall back to lexicographic order otherwise, so identical input always
 * ranks identically. The full ranking is returned; truncation belongs to
 * the coverage walk.
 */
export function rankTable(table: FrequencyTable): RankedEntry[] {
  const firstSeen = table.firstSeen;
  const pairs = [...table.counts];

  pairs.sort(([ka, ca], [kb, cb]) => {
    if (ca !== cb) return cb - ca;
    if (firstSeen !== null) {
      const fa = firstSeen.get(ka) ?? Number.MAX_SAFE_INTEGER;
      const fb = firstSeen.get(kb) ?? Number.MAX_SAFE_INTEGER;
      if (fa !== fb) return fa - fb;
    }
    return compareKeys(ka, kb);
  });

  return pairs.map(([key, count], i) => ({ key, count, rank: i + 1 }));
}
