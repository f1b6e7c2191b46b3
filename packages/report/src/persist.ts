/**
 * Writing rendered reports to disk.
 *
 * Every I/O operation is wrapped in `Effect.tryPromise` so callers get typed
 * `ReportError` failures instead of raw exceptions.
 */
import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { Effect } from "effect";
import { ReportError } from "@lexcov/core";

/**
 * Write a rendered report, creating parent directories if they don't
 * already exist.
 */
export function writeReport(path: string, contents: string): Effect.Effect<void, ReportError> {
  return Effect.tryPromise({
    try: async () => {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, contents, "utf-8");
    },
    catch: (cause) =>
      new ReportError({ message: `Failed to write report to "${path}"`, path, cause }),
  });
}

/** `<dir>/<name>_top_words.csv` beside an input document. */
export function defaultWordListPath(inputPath: string): string {
  const dot = inputPath.lastIndexOf(".");
  const slash = Math.max(inputPath.lastIndexOf("/"), inputPath.lastIndexOf("\\"));
  const base = dot > slash + 1 ? inputPath.slice(0, dot) : inputPath;
  return `${base}_top_words.csv`;
}
