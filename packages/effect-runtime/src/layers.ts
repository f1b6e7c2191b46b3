/**
 * Effect layers for dependency injection.
 *
 * Each collaborator of the engine gets a Layer that provides its service.
 */
import { Layer, Logger, type LogLevel } from "effect";
import {
  DocumentReaderService, MorphologyService,
  type DocumentReader, type MorphologyProvider,
} from "@lexcov/core";
import { prettyLogger } from "./logging.js";

// ── Reader Layer ───────────────────────────────────────────────────────────

export const ReaderFrom = (reader: DocumentReader) =>
  Layer.succeed(DocumentReaderService, reader);

// ── Morphology Layer ───────────────────────────────────────────────────────

export const MorphologyFrom = (provider: MorphologyProvider) =>
  Layer.succeed(MorphologyService, provider);

// ── Logging Layer ──────────────────────────────────────────────────────────

/** Replace the default logger with `prettyLogger`, filtered at `level`. */
export const LoggingLive = (level: LogLevel.LogLevel) =>
  Layer.merge(
    Logger.replace(Logger.defaultLogger, prettyLogger),
    Logger.minimumLogLevel(level),
  );
