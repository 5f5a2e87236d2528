/**
 * Text -> index sequences.
 *
 * Streams a corpus file line by line, maps every word through a dictionary,
 * terminates each sentence with `</s>` and hands the result to a consumer
 * (normally `IndexedDatasetBuilder.addItem`).
 */
import { Effect } from "effect";
import {
  TokenizerService,
  keepTypedOr,
  readLines,
  type ConsistencyError,
  type FormatError,
  type IoError,
  type ItemConsumer,
  type Tokenizer,
  type UsageError,
} from "@bitext/core";
import type { Dictionary } from "@bitext/dictionary";

export interface EncodeOptions {
  /** Register unseen words instead of mapping them to `<unk>`. */
  readonly extendVocabulary?: boolean;
  /** Called for every word with the index it resolved to. */
  readonly onWord?: (word: string, index: number) => void;
}

/** Encode one line: one index per word, then the end-of-sentence index. */
export function encodeLine(
  line: string,
  dict: Dictionary,
  tokenizer: Tokenizer,
  options: EncodeOptions = {},
): Int32Array {
  const words = tokenizer.tokenize(line);
  const ids = new Int32Array(words.length + 1);
  for (let i = 0; i < words.length; i++) {
    const index = options.extendVocabulary ? dict.add(words[i]) : dict.lookup(words[i]);
    options.onWord?.(words[i], index);
    ids[i] = index;
  }
  ids[words.length] = dict.eosIndex;
  return ids;
}

export interface BinarizeStats {
  /** Lines read. */
  readonly sentences: number;
  /** Elements emitted, end-of-sentence markers included. */
  readonly tokens: number;
  /** Words mapped to `<unk>` that were not literally `<unk>` in the text. */
  readonly unknowns: number;
  /** Occurrences per replaced word. */
  readonly replaced: ReadonlyMap<string, number>;
}

/**
 * Encode every line of `path` and feed each sequence to `consumer`, in file
 * order. The dictionary is only extended when `extendVocabulary` is set.
 */
export function binarize(
  path: string,
  dict: Dictionary,
  consumer: ItemConsumer,
  options: { readonly extendVocabulary?: boolean } = {},
): Effect.Effect<BinarizeStats, FormatError | ConsistencyError | UsageError | IoError, TokenizerService> {
  return Effect.gen(function* () {
    const tokenizer = yield* TokenizerService;
    return yield* Effect.tryPromise({
      try: async () => {
        let sentences = 0;
        let tokens = 0;
        let unknowns = 0;
        const replaced = new Map<string, number>();
        const onWord = (word: string, index: number): void => {
          if (index === dict.unkIndex && word !== dict.unkWord) {
            unknowns++;
            replaced.set(word, (replaced.get(word) ?? 0) + 1);
          }
        };

        for await (const line of readLines(path)) {
          const ids = encodeLine(line, dict, tokenizer, {
            extendVocabulary: options.extendVocabulary,
            onWord,
          });
          sentences++;
          consumer(ids);
          tokens += ids.length;
        }

        return { sentences, tokens, unknowns, replaced } satisfies BinarizeStats;
      },
      catch: keepTypedOr(path, `binarize "${path}"`),
    });
  });
}

/** Share of emitted elements that were replaced by `<unk>`; 0 for empty input. */
export function unknownRate(stats: BinarizeStats): number {
  return stats.tokens === 0 ? 0 : stats.unknowns / stats.tokens;
}

/** e.g. `| [en] data/train.en: 3 sents, 12 tokens, 8.33% replaced by <unk>` */
export function formatBinarizeReport(
  lang: string,
  path: string,
  stats: BinarizeStats,
  dict: Dictionary,
): string {
  const pct = (100 * unknownRate(stats)).toFixed(2);
  return `| [${lang}] ${path}: ${stats.sentences} sents, ${stats.tokens} tokens, ${pct}% replaced by ${dict.unkWord}`;
}
