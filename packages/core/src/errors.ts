/**
 * Typed error classes for every subsystem.
 */
import { Data } from "effect";

/** Missing or unreadable source, unsupported format, corrupt container. */
export class InputError extends Data.TaggedError("InputError")<{
  readonly message: string;
  readonly path?: string;
  readonly cause?: unknown;
}> {}

/** Morphology provider missing or failing mid-run. */
export class NormalizationError extends Data.TaggedError("NormalizationError")<{
  readonly message: string;
  readonly token?: string;
  readonly cause?: unknown;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class ReportError extends Data.TaggedError("ReportError")<{
  readonly message: string;
  readonly path?: string;
  readonly cause?: unknown;
}> {}
