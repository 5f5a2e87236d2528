/**
 * @bitext/tokenizers -- line tokenizers for corpus preprocessing.
 *
 * Provides a whitespace tokenizer, a character tokenizer, and a
 * pre-populated registry so the CLI can look tokenizers up by name.
 */
import { Registry, type Tokenizer } from "@bitext/core";
import { WhitespaceTokenizer } from "./space.js";
import { CharTokenizer } from "./char.js";

// ── Re-exports ────────────────────────────────────────────────────────────
export { WhitespaceTokenizer } from "./space.js";
export { CharTokenizer } from "./char.js";

// ── Tokenizer registry ────────────────────────────────────────────────────

/**
 * Global tokenizer registry.
 *
 * Pre-registered implementations:
 * - `"space"` -- whitespace-separated words (default)
 * - `"char"`  -- one word per non-whitespace character
 *
 * Usage:
 * ```ts
 * const tok = tokenizerRegistry.get("space");
 * ```
 */
export const tokenizerRegistry = new Registry<Tokenizer>("tokenizer");

tokenizerRegistry.register(
  "space",
  () => new WhitespaceTokenizer(),
  "words separated by whitespace (default)",
);
tokenizerRegistry.register(
  "char",
  () => new CharTokenizer(),
  "one word per non-whitespace character",
);
