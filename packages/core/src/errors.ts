/**
 * Typed error classes shared by every package.
 *
 * Each class is a `Data.TaggedError`, so it can sit in an Effect failure
 * channel or be thrown from a synchronous method and still be matched by tag.
 */
import { Data } from "effect";

/** Malformed input: a bad dictionary line, alignment pair or index header. */
export class FormatError extends Data.TaggedError("FormatError")<{
  readonly message: string;
  readonly path?: string;
  readonly line?: number;
}> {}

/** Input that parses but contradicts itself or another input. */
export class ConsistencyError extends Data.TaggedError("ConsistencyError")<{
  readonly message: string;
  readonly path?: string;
  readonly line?: number;
}> {}

/** A programming error: sealed builder, finalized dictionary, bad index. */
export class UsageError extends Data.TaggedError("UsageError")<{
  readonly message: string;
}> {}

export class IoError extends Data.TaggedError("IoError")<{
  readonly message: string;
  readonly path: string;
  readonly cause?: unknown;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export type PipelineError =
  | FormatError
  | ConsistencyError
  | UsageError
  | IoError
  | ConfigError;

/** Render an error with its file/line context for the CLI. */
export function describeError(error: PipelineError): string {
  const where =
    "path" in error && error.path !== undefined
      ? ` (${error.path}${"line" in error && error.line !== undefined ? `:${error.line}` : ""})`
      : "";
  return `${error._tag}: ${error.message}${where}`;
}

/**
 * Build a `catch` handler for `Effect.tryPromise` / `Effect.try` that keeps
 * already-typed errors thrown inside the block and wraps everything else as
 * an `IoError` on `path`. An `IoError` raised deeper keeps its own path.
 */
export function keepTypedOr(path: string, action: string) {
  return (cause: unknown): FormatError | ConsistencyError | UsageError | IoError => {
    if (
      cause instanceof FormatError ||
      cause instanceof ConsistencyError ||
      cause instanceof UsageError ||
      cause instanceof IoError
    ) {
      return cause;
    }
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new IoError({ message: `Failed to ${action}: ${reason}`, path, cause });
  };
}
