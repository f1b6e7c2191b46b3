/**
 * Frequency counting over a normalized key stream.
 */
import type { CanonicalKey, FrequencyTable } from "@lexcov/core";

/**
 * Count occurrences of each key in one pass.
 *
 * The table remembers where each key first appeared so the ranker can break
 * ties by stream order.
 */
export function countKeys(keys: Iterable<CanonicalKey>): FrequencyTable {
  const counts = new Map<CanonicalKey, number>();
  const firstSeen = new Map<CanonicalKey, number>();
  let total = 0;

  for (const key of keys) {
    const prev = counts.get(key);
    if (prev === undefined) {
      counts.set(key, 1);
      firstSeen.set(key, total);
    } else {
      counts.set(key, prev + 1);
    }
    total++;
  }

  return {
    counts,
    firstSeen,
    tieBreak: "first-seen",
    totalOccurrences: total,
    distinctKeys: counts.size,
  };
}

/**
 * Combine partial tables, e.g. from chunks counted separately.
 *
 * Counts add, so the merge is associative and commutative. Stream order is
 * meaningless across chunks; the result ranks ties lexicographically.
 */
export function mergeTables(tables: Iterable<FrequencyTable>): FrequencyTable {
  const counts = new Map<CanonicalKey, number>();
  let total = 0;

  for (const table of tables) {
    for (const [key, count] of table.counts) {
      counts.set(key, (counts.get(key) ?? 0) + count);
      total += count;
    }
  }

  return {
    counts,
    firstSeen: null,
    tieBreak: "lexicographic",
    totalOccurrences: total,
    distinctKeys: counts.size,
  };
}

/** Empty table, as produced when no token survives normalization. */
export function emptyTable(): FrequencyTable {
  return countKeys([]);
}
