/**
 * Subsystem interfaces (ports). Every subsystem implements one of these.
 */
import { Context } from "effect";

// ── Tokenizer ──────────────────────────────────────────────────────────────

/**
 * Splits one raw line into words. Must be pure: the same line always yields
 * the same words, and no state carries over between calls.
 */
export interface Tokenizer {
  readonly name: string;
  tokenize(line: string): readonly string[];
}

export class TokenizerService extends Context.Tag("TokenizerService")<
  TokenizerService,
  Tokenizer
>() {}

// ── Item consumer ──────────────────────────────────────────────────────────

/** Receives one encoded sentence. Called once per input line, in file order. */
export type ItemConsumer = (ids: Int32Array) => void;
