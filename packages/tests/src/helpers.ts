/**
 * Shared fixtures: scratch directories and an Effect runner with a
 * whitespace tokenizer and logging switched off.
 */
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach } from "vitest";
import { Effect, Logger, LogLevel } from "effect";
import type { TokenizerService } from "@bitext/core";
import { WhitespaceTokenizer } from "@bitext/tokenizers";
import { TokenizerFrom } from "@bitext/effect-runtime";

const dirs: string[] = [];

afterEach(() => {
  while (dirs.length > 0) {
    const dir = dirs.pop();
    if (dir) rmSync(dir, { recursive: true, force: true });
  }
});

/** Fresh directory, removed after the current test. */
export function scratchDir(): string {
  const dir = mkdtempSync(join(tmpdir(), "bitext-"));
  dirs.push(dir);
  return dir;
}

/** Write `content` to `dir/name` and return the full path. */
export function writeText(dir: string, name: string, content: string): string {
  const path = join(dir, name);
  writeFileSync(path, content, "utf-8");
  return path;
}

function quiet<A, E>(effect: Effect.Effect<A, E, TokenizerService>): Effect.Effect<A, E> {
  return effect.pipe(
    Effect.provide(TokenizerFrom(new WhitespaceTokenizer())),
    Logger.withMinimumLogLevel(LogLevel.None),
  );
}

/** Run to success. */
export function run<A, E>(effect: Effect.Effect<A, E, TokenizerService>): Promise<A> {
  return Effect.runPromise(quiet(effect));
}

/** Run expecting failure; resolves to the error value. */
export function runError<A, E>(effect: Effect.Effect<A, E, TokenizerService>): Promise<E> {
  return Effect.runPromise(Effect.flip(quiet(effect)));
}
