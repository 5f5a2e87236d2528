/**
 * Character-level tokenizer.
 *
 * Every non-whitespace code point becomes its own word. Useful for scripts
 * written without spaces, where a dictionary of characters is the natural
 * vocabulary.
 */
import type { Tokenizer } from "@bitext/core";

export class CharTokenizer implements Tokenizer {
  readonly name = "char";

  tokenize(line: string): readonly string[] {
    const chars: string[] = [];
    // for..of walks code points, so surrogate pairs stay whole
    for (const ch of line) {
      if (!/\s/.test(ch)) {
        chars.push(ch);
      }
    }
    return chars;
  }
}
