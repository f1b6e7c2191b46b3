/**
 * Resolve run settings and pluggable collaborators from CLI args.
 */
import { Effect } from "effect";
import {
  ConfigError,
  type CoverageTarget,
  type MorphologyProvider,
  type NormalizationError,
} from "@lexcov/core";
import { builtinStopwordLists, loadStopwords, vowelSet, RUSSIAN_VOWELS } from "@lexcov/coverage";
import { DictionaryMorphology } from "@lexcov/morphology";
import { readerRegistry } from "@lexcov/ingest";
import { floatArg, intArg, optionalArg, type KV } from "./parse.js";

/** Exactly one of --percentage and --count. */
export function resolveTarget(kv: KV): CoverageTarget {
  const hasPct = optionalArg(kv, "percentage") !== undefined;
  const hasCount = optionalArg(kv, "count") !== undefined;
  if (hasPct === hasCount) {
    throw new ConfigError({ message: "Specify exactly one of --percentage=<0-100> or --count=<n>" });
  }
  if (hasPct) {
    const percentage = floatArg(kv, "percentage", 0);
    if (percentage <= 0 || percentage > 100) {
      throw new ConfigError({ message: `--percentage must be in (0, 100], got ${percentage}` });
    }
    return { kind: "percentage", percentage };
  }
  const count = intArg(kv, "count", 0);
  if (count <= 0) {
    throw new ConfigError({ message: `--count must be a positive integer, got ${count}` });
  }
  return { kind: "count", count };
}

/** Lexicon path from --dictionary, falling back to LEXCOV_DICTIONARY. */
export function dictionaryPath(kv: KV): string | undefined {
  return optionalArg(kv, "dictionary") ?? (process.env.LEXCOV_DICTIONARY || undefined);
}

export function resolveMorphology(kv: KV): Effect.Effect<MorphologyProvider | null, NormalizationError> {
  const path = dictionaryPath(kv);
  return path === undefined ? Effect.succeed(null) : DictionaryMorphology.load(path);
}

export function resolveStopwords(kv: KV): Effect.Effect<ReadonlySet<string>, ConfigError> {
  const spec = optionalArg(kv, "stopwords");
  return spec === undefined ? Effect.succeed(new Set<string>()) : loadStopwords(spec);
}

export function resolveVowels(kv: KV): ReadonlySet<string> {
  const chars = optionalArg(kv, "vowels");
  return chars === undefined ? RUSSIAN_VOWELS : vowelSet(chars);
}

export function resolveLogLevelName(kv: KV): string {
  return optionalArg(kv, "logLevel") ?? process.env.LEXCOV_LOG_LEVEL ?? "info";
}

export function listImplementations(): string {
  return [
    `Readers:   ${readerRegistry.list().join(", ")}`,
    `Stopwords: ${builtinStopwordLists().join(", ")}, or a file with one word per line`,
  ].join("\n");
}
