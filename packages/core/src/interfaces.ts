/**
 * Subsystem interfaces (ports). Every collaborator of the engine implements one of these.
 */
import { Context, Effect } from "effect";
import type { InputError, NormalizationError } from "./errors.js";
import type { MorphAnalysis } from "./types.js";

// ── Document reader ────────────────────────────────────────────────────────
export interface DocumentReader {
  readonly name: string;
  /** Lowercase file extensions this reader handles, without the dot. */
  readonly extensions: readonly string[];
  /** Natural-language content of the document, markup stripped. */
  read(path: string): Effect.Effect<string, InputError>;
}

export class DocumentReaderService extends Context.Tag("DocumentReaderService")<
  DocumentReaderService,
  DocumentReader
>() {}

// ── Morphology ─────────────────────────────────────────────────────────────
export interface MorphologyProvider {
  readonly name: string;
  /**
   * Candidate analyses for a lowercased token, most likely first.
   * Never empty: unknown words analyse to themselves with no part of speech.
   */
  analyze(token: string): Effect.Effect<readonly MorphAnalysis[], NormalizationError>;
}

export class MorphologyService extends Context.Tag("MorphologyService")<
  MorphologyService,
  MorphologyProvider
>() {}
