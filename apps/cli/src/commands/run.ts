/**
 * Shared runner for commands: provides the reader, morphology and logging
 * layers and runs the program to a promise.
 */
import { Effect } from "effect";
import type { DocumentReaderService } from "@lexcov/core";
import { AutoReader } from "@lexcov/ingest";
import { LoggingLive, ReaderFrom, parseLogLevel } from "@lexcov/effect-runtime";
import type { KV } from "../parse.js";
import { resolveLogLevelName } from "../resolve.js";

export function runCommand<A, E>(
  kv: KV,
  program: Effect.Effect<A, E, DocumentReaderService>,
): Promise<A> {
  return program.pipe(
    Effect.provide(ReaderFrom(new AutoReader())),
    Effect.provide(LoggingLive(parseLogLevel(resolveLogLevelName(kv)))),
    Effect.runPromise,
  );
}
