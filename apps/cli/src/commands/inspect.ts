/**
 * Command: bitext inspect
 *
 * Prints a dataset's header and a window of its items, decoded through a
 * dictionary when one is given.
 */
import { Effect } from "effect";
import { ConfigError, keepTypedOr, type PipelineError } from "@bitext/core";
import { IndexedDataset } from "@bitext/dataset";
import { loadDictionary } from "@bitext/dictionary";
import { checkKnown, intArg, parseKV, requireArg, strArg } from "../parse.js";
import { asConfigError, runCommand } from "../run.js";

export function inspectProgram(args: string[]): Effect.Effect<string[], PipelineError> {
  return Effect.gen(function* () {
    const kv = yield* Effect.try({ try: () => parseKV(args), catch: asConfigError });
    const opts = yield* Effect.try({
      try: () => {
        checkKnown(kv, ["index", "data", "dict", "from", "count"]);
        const index = requireArg(kv, "index", "path to the .idx file");
        const from = intArg(kv, "from", 0);
        const count = intArg(kv, "count", 10);
        if (from < 0 || count < 0) {
          throw new ConfigError({ message: "--from and --count must be >= 0" });
        }
        return {
          index,
          data: strArg(kv, "data", index.replace(/\.idx$/, "") + ".bin"),
          dict: kv["dict"],
          from,
          count,
        };
      },
      catch: asConfigError,
    });

    const dict = opts.dict ? yield* loadDictionary(opts.dict) : undefined;

    return yield* Effect.scoped(
      Effect.gen(function* () {
        const ds = yield* IndexedDataset.open(opts.index, opts.data);
        const lines = [`${ds.length} items, ${ds.elementCount} elements, dtype ${ds.dtype}`];
        const end = Math.min(opts.from + opts.count, ds.length);
        for (let i = opts.from; i < end; i++) {
          const ids = yield* Effect.try({
            try: () => ds.get(i),
            catch: keepTypedOr(opts.data, `read item ${i}`),
          });
          const text = dict ? dict.string(ids, { stripEos: false }) : Array.from(ids).join(" ");
          lines.push(`${i}\t${text}`);
        }
        return lines;
      }),
    );
  });
}

export async function inspectCmd(args: string[]): Promise<void> {
  await runCommand(inspectProgram(args), (lines) => {
    for (const line of lines) console.log(line);
  });
}
