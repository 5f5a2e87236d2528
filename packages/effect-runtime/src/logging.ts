/**
 * Console logging for pipeline runs.
 *
 * Progress lines go to stdout; warnings and errors go to stderr.
 */
import { Effect, Logger, LogLevel } from "effect";
import type { LogLevelName } from "@bitext/core";

// ── Pretty logger ──────────────────────────────────────────────────────────

export const prettyLogger = Logger.make(({ logLevel, message, date, annotations }) => {
  const ts = date.toISOString().slice(11, 23);
  const lvl = logLevel.label.toUpperCase().padEnd(5);
  const parts = Array.isArray(message) ? message : [message];
  let msg = parts.map((m) => (typeof m === "string" ? m : JSON.stringify(m))).join(" ");
  for (const [key, value] of annotations) {
    msg += ` ${key}=${typeof value === "string" ? value : JSON.stringify(value)}`;
  }
  const line = `[${ts}] ${lvl} ${msg}`;
  if (LogLevel.greaterThanEqual(logLevel, LogLevel.Warning)) {
    console.error(line);
  } else {
    console.log(line);
  }
});

// ── Log level from config ──────────────────────────────────────────────────

const LEVELS: Readonly<Record<LogLevelName, LogLevel.LogLevel>> = {
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warn: LogLevel.Warning,
  error: LogLevel.Error,
};

export function parseLogLevel(level: LogLevelName): LogLevel.LogLevel {
  return LEVELS[level];
}

// ── Installation ───────────────────────────────────────────────────────────

/** Run `effect` with `prettyLogger` at the given minimum level. */
export const withLogging =
  (level: LogLevelName) =>
  <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    effect.pipe(
      Logger.withMinimumLogLevel(parseLogLevel(level)),
      Effect.provide(Logger.replace(Logger.defaultLogger, prettyLogger)),
    );
