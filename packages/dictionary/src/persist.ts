/**
 * Building, loading and saving dictionaries.
 *
 * Every I/O operation is wrapped in `Effect.tryPromise`, so callers get typed
 * failures instead of raw exceptions. Format and consistency errors raised
 * while parsing keep their own tag.
 */
import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { Effect } from "effect";
import {
  IoError,
  TokenizerService,
  keepTypedOr,
  readLines,
  type ConsistencyError,
  type FormatError,
  type UsageError,
} from "@bitext/core";
import { Dictionary } from "./dictionary.js";

/**
 * Scan a training file and count every word the injected tokenizer yields.
 * The returned dictionary is still open: call `finalize()` (or
 * `saveDictionary`) before using it to encode.
 */
export function buildDictionary(
  path: string,
): Effect.Effect<Dictionary, FormatError | ConsistencyError | UsageError | IoError, TokenizerService> {
  return Effect.gen(function* () {
    const tokenizer = yield* TokenizerService;
    const dict = yield* Effect.tryPromise({
      try: async () => {
        const d = new Dictionary();
        for await (const line of readLines(path)) {
          for (const word of tokenizer.tokenize(line)) {
            d.add(word);
          }
        }
        return d;
      },
      catch: keepTypedOr(path, `build dictionary from "${path}"`),
    });
    yield* Effect.logDebug(`Built dictionary from ${path}: ${dict.size} symbols`);
    return dict;
  });
}

/**
 * Load a persisted `"<symbol> <count>"` listing.
 *
 * @param path - Listing written by `saveDictionary`.
 */
export function loadDictionary(
  path: string,
): Effect.Effect<Dictionary, FormatError | ConsistencyError | UsageError | IoError> {
  return Effect.tryPromise({
    try: async () => Dictionary.parse(await readFile(path, "utf-8"), path),
    catch: keepTypedOr(path, `load dictionary from "${path}"`),
  });
}

/**
 * Apply the pruning policy to `dict` and write its listing.
 *
 * An open dictionary is finalized (sorted by count). A sealed one, such as a
 * loaded listing, is only pruned, so its symbols keep their indices.
 * Creates parent directories if they don't already exist. Reserved symbols
 * are implicit and not written.
 */
export function saveDictionary(
  path: string,
  dict: Dictionary,
  threshold = 0,
  maxSize = -1,
): Effect.Effect<void, IoError> {
  return Effect.tryPromise({
    try: async () => {
      if (dict.sealed) {
        dict.prune(threshold, maxSize);
      } else {
        dict.finalize(threshold, maxSize);
      }
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, dict.toListing(), "utf-8");
    },
    catch: (cause) =>
      new IoError({
        message: `Failed to save dictionary to "${path}"`,
        path,
        cause,
      }),
  });
}
