/**
 * Structured logging and tracing integration.
 *
 * Provides a console logger for CLI runs and span helpers for tracing
 * pipeline stages.
 */
import { Effect, Logger, LogLevel } from "effect";

// ── Pretty logger ──────────────────────────────────────────────────────────

/** Render a log message, which Effect may hand over as an array of parts. */
export function formatMessage(message: unknown): string {
  const parts = Array.isArray(message) ? message : [message];
  return parts.map((p) => (typeof p === "string" ? p : JSON.stringify(p))).join(" ");
}

export const prettyLogger = Logger.make(({ logLevel, message, date }) => {
  const ts = date.toISOString().slice(11, 23);
  const lvl = logLevel.label.toUpperCase().padEnd(5);
  const line = `[${ts}] ${lvl} ${formatMessage(message)}`;
  if (LogLevel.greaterThanEqual(logLevel, LogLevel.Warning)) console.error(line);
  else console.log(line);
});

// ── Span helpers ───────────────────────────────────────────────────────────

export function withSpan<A, E, R>(name: string, effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> {
  return Effect.withSpan(name)(effect);
}

// ── Log level from string ──────────────────────────────────────────────────

export function parseLogLevel(level: string): LogLevel.LogLevel {
  switch (level.toLowerCase()) {
    case "debug": return LogLevel.Debug;
    case "info": return LogLevel.Info;
    case "warn":
    case "warning": return LogLevel.Warning;
    case "error": return LogLevel.Error;
    case "none":
    case "off": return LogLevel.None;
    default: return LogLevel.Info;
  }
}
