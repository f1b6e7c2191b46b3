/**
 * @lexcov/ingest -- document readers and the word tokenizer.
 *
 * Provides plain-text, HTML and EPUB readers, a registry keyed by file
 * extension, and the tokenizer that turns extracted text into word tokens.
 */
import { Effect } from "effect";
import { InputError, Registry, type DocumentReader } from "@lexcov/core";
import { EpubReader, HtmlReader, PlainTextReader } from "./readers.js";

// ── Re-exports ────────────────────────────────────────────────────────────
export { PlainTextReader, HtmlReader, EpubReader, epubReadingOrder } from "./readers.js";
export { stripMarkup, decodeEntities } from "./markup.js";
export { readZipEntries, extractEntry, type ZipEntry } from "./zip.js";
export { tokenize } from "./tokenize.js";

// ── Reader registry ───────────────────────────────────────────────────────

/**
 * Readers keyed by lowercase file extension.
 *
 * Usage:
 * ```ts
 * const reader = readerRegistry.find("epub");
 * ```
 */
export const readerRegistry = new Registry<DocumentReader>("reader");

const factories: Array<() => DocumentReader> = [
  () => new PlainTextReader(),
  () => new HtmlReader(),
  () => new EpubReader(),
];

for (const make of factories) {
  for (const ext of make().extensions) readerRegistry.register(ext, make);
}

function extensionOf(path: string): string {
  const base = path.slice(Math.max(path.lastIndexOf("/"), path.lastIndexOf("\\")) + 1);
  const dot = base.lastIndexOf(".");
  return dot > 0 ? base.slice(dot + 1).toLowerCase() : "";
}

/** Reader for a path by its extension. Files without one read as plain text. */
export function readerFor(path: string): Effect.Effect<DocumentReader, InputError> {
  const ext = extensionOf(path);
  const reader = readerRegistry.find(ext === "" ? "txt" : ext);
  if (!reader) {
    return Effect.fail(
      new InputError({
        message: `Unsupported document format ".${ext}" for "${path}". Supported: ${readerRegistry.list().join(", ")}`,
        path,
      }),
    );
  }
  return Effect.succeed(reader);
}

/**
 * Reader that dispatches on each path's extension. This is the default
 * document reader service.
 */
export class AutoReader implements DocumentReader {
  readonly name = "auto";
  readonly extensions: readonly string[] = readerRegistry.list();

  read(path: string): Effect.Effect<string, InputError> {
    return Effect.flatMap(readerFor(path), (reader) => reader.read(path));
  }
}
