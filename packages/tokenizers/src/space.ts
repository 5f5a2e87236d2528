/**
 * Whitespace tokenizer.
 *
 * Designed for pre-tokenized corpora where words are already separated by
 * spaces. Runs of any whitespace count as one separator; leading and trailing
 * whitespace is ignored.
 */
import type { Tokenizer } from "@bitext/core";

const SPACE_NORMALIZER = /\s+/g;

export class WhitespaceTokenizer implements Tokenizer {
  readonly name = "space";

  /** Split a line into words. A blank line yields no words. */
  tokenize(line: string): readonly string[] {
    const normalized = line.replace(SPACE_NORMALIZER, " ").trim();
    return normalized.length === 0 ? [] : normalized.split(" ");
  }
}
