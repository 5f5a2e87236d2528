/**
 * Effect layers for dependency injection.
 *
 * The tokenizer is the one service the pipeline takes from its environment.
 */
import { Effect, Layer } from "effect";
import { ConfigError, TokenizerService, type Tokenizer } from "@bitext/core";
import { tokenizerRegistry } from "@bitext/tokenizers";

// ── Tokenizer Layer ────────────────────────────────────────────────────────

export const TokenizerFrom = (tokenizer: Tokenizer) =>
  Layer.succeed(TokenizerService, tokenizer);

/** Resolve a registered tokenizer by name; unknown names fail with `ConfigError`. */
export const TokenizerNamed = (name: string) =>
  Layer.effect(
    TokenizerService,
    Effect.try({
      try: () => tokenizerRegistry.get(name),
      catch: (cause) =>
        cause instanceof ConfigError
          ? cause
          : new ConfigError({ message: `Failed to create tokenizer "${name}"`, cause }),
    }),
  );
