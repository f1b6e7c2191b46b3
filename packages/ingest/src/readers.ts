/**
 * Document readers: plain text, HTML/XHTML and EPUB.
 *
 * Every I/O operation is wrapped in `Effect.tryPromise` so callers get typed
 * `InputError` failures naming the file instead of raw exceptions.
 */
import { readFile } from "node:fs/promises";
import { posix } from "node:path";
import { Effect } from "effect";
import { InputError, type DocumentReader } from "@lexcov/core";
import { stripMarkup } from "./markup.js";
import { extractEntry, readZipEntries, type ZipEntry } from "./zip.js";

function readUtf8(path: string): Effect.Effect<string, InputError> {
  return Effect.tryPromise({
    try: async () => {
      const text = await readFile(path, "utf-8");
      return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
    },
    catch: (cause) => new InputError({ message: `Failed to read "${path}"`, path, cause }),
  });
}

export class PlainTextReader implements DocumentReader {
  readonly name = "text";
  readonly extensions = ["txt", "text", "md"];

  read(path: string): Effect.Effect<string, InputError> {
    return readUtf8(path);
  }
}

export class HtmlReader implements DocumentReader {
  readonly name = "html";
  readonly extensions = ["html", "htm", "xhtml"];

  read(path: string): Effect.Effect<string, InputError> {
    return Effect.map(readUtf8(path), stripMarkup);
  }
}

// ── EPUB ───────────────────────────────────────────────────────────────────

const CONTAINER_PATH = "META-INF/container.xml";
const XHTML_RE = /\.(x?html?)$/i;

function attr(tag: string, name: string): string | undefined {
  const m = new RegExp(`\\s${name}\\s*=\\s*(?:"([^"]*)"|'([^']*)')`, "i").exec(tag);
  return m ? (m[1] ?? m[2]) : undefined;
}

function decodeHref(href: string): string {
  try {
    return decodeURIComponent(href);
  } catch {
    return href;
  }
}

/**
 * Content documents in reading order: the package's spine when the
 * container names one, otherwise every XHTML entry in archive order.
 */
export function epubReadingOrder(entries: readonly ZipEntry[], readText: (e: ZipEntry) => string): ZipEntry[] {
  const byName = new Map(entries.map((e) => [e.name, e]));
  const fallback = entries.filter((e) => XHTML_RE.test(e.name));

  const container = byName.get(CONTAINER_PATH);
  if (!container) return fallback;
  const rootfile = /<rootfile\b[^>]*>/i.exec(readText(container));
  const opfPath = rootfile ? attr(rootfile[0], "full-path") : undefined;
  const opf = opfPath ? byName.get(opfPath) : undefined;
  if (!opfPath || !opf) return fallback;

  const opfText = readText(opf);
  const opfDir = posix.dirname(opfPath);
  const manifest = new Map<string, string>();
  for (const m of opfText.matchAll(/<item\b[^>]*>/gi)) {
    const id = attr(m[0], "id");
    const href = attr(m[0], "href");
    if (id && href) {
      manifest.set(id, posix.normalize(posix.join(opfDir, decodeHref(href))));
    }
  }

  const ordered: ZipEntry[] = [];
  for (const m of opfText.matchAll(/<itemref\b[^>]*>/gi)) {
    const idref = attr(m[0], "idref");
    const path = idref ? manifest.get(idref) : undefined;
    const entry = path ? byName.get(path) : undefined;
    if (entry) ordered.push(entry);
  }
  return ordered.length > 0 ? ordered : fallback;
}

export class EpubReader implements DocumentReader {
  readonly name = "epub";
  readonly extensions = ["epub"];

  read(path: string): Effect.Effect<string, InputError> {
    return Effect.flatMap(
      Effect.tryPromise({
        try: () => readFile(path),
        catch: (cause) => new InputError({ message: `Failed to read "${path}"`, path, cause }),
      }),
      (buf) =>
        Effect.try({
          try: () => {
            const entries = readZipEntries(buf);
            const readText = (e: ZipEntry) => extractEntry(buf, e).toString("utf-8");
            const docs = epubReadingOrder(entries, readText);
            if (docs.length === 0) {
              throw new Error("EPUB contains no content documents");
            }
            return docs.map((e) => stripMarkup(readText(e))).join("\n");
          },
          catch: (cause) =>
            new InputError({ message: `Failed to extract text from EPUB "${path}"`, path, cause }),
        }),
    );
  }
}
