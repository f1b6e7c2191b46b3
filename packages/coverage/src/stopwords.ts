/**
 * Stopword lists: built-in lists shipped in `data/`, or a user file with one
 * word per line.
 */
import { readFile } from "node:fs/promises";
import { Effect } from "effect";
import { ConfigError } from "@lexcov/core";

const BUILTIN_LISTS = new Map<string, string>([
  ["ru", "stopwords-ru.txt"],
]);

export function builtinStopwordLists(): string[] {
  return [...BUILTIN_LISTS.keys()];
}

/** One word per line; `#` starts a comment line. Words are lowercased. */
export function parseStopwords(text: string): Set<string> {
  const words = new Set<string>();
  for (const line of text.split(/\r?\n/)) {
    const word = line.trim().toLowerCase();
    if (word.length > 0 && !word.startsWith("#")) words.add(word);
  }
  return words;
}

/**
 * Load a stopword set by built-in list name (e.g. `ru`) or file path.
 */
export function loadStopwords(nameOrPath: string): Effect.Effect<Set<string>, ConfigError> {
  const builtin = BUILTIN_LISTS.get(nameOrPath);
  const location = builtin ? new URL(`../data/${builtin}`, import.meta.url) : nameOrPath;
  return Effect.tryPromise({
    try: async () => parseStopwords(await readFile(location, "utf-8")),
    catch: (cause) =>
      new ConfigError({ message: `Failed to load stopword list "${nameOrPath}"`, cause }),
  });
}
