/**
 * Run a command's effect and turn failures into a message and exit code.
 */
import { Cause, Effect, Exit, Option } from "effect";
import { ConfigError, describeError, type PipelineError } from "@bitext/core";

/** Wrap anything thrown while reading arguments as a `ConfigError`. */
export function asConfigError(cause: unknown): ConfigError {
  if (cause instanceof ConfigError) return cause;
  return new ConfigError({ message: cause instanceof Error ? cause.message : String(cause), cause });
}

export async function runCommand<A>(
  program: Effect.Effect<A, PipelineError>,
  onSuccess: (value: A) => void,
): Promise<void> {
  const exit = await Effect.runPromiseExit(program);
  if (Exit.isSuccess(exit)) {
    onSuccess(exit.value);
    return;
  }
  const failure = Cause.failureOption(exit.cause);
  if (Option.isSome(failure)) {
    console.error(`Fatal: ${describeError(failure.value)}`);
  } else {
    console.error(`Fatal: ${Cause.pretty(exit.cause)}`);
  }
  process.exitCode = 1;
}
