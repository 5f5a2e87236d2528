#!/usr/bin/env node
/**
 * bitext CLI entry point.
 *
 * Commands: preprocess, inspect
 */
import { preprocessCmd } from "./commands/preprocess.js";
import { inspectCmd } from "./commands/inspect.js";
import { tokenizerRegistry } from "@bitext/tokenizers";

const USAGE = `
bitext: parallel-corpus preprocessing

Commands:
  preprocess       Build dictionaries and binarize train/valid/test splits
  inspect          Print items of a binarized dataset

Preprocess options:
  --source-lang=SRC --target-lang=TGT   language suffixes (required)
  --trainpref=FP   training file prefix (default: train)
  --validpref=FP   comma-separated validation prefixes (default: valid)
  --testpref=FP    comma-separated test prefixes (default: test)
  --destdir=DIR    output directory (default: data-bin)
  --thresholdsrc=N, --thresholdtgt=N   map words seen fewer than N times to <unk>
  --nwordssrc=N, --nwordstgt=N         number of words to retain (-1 = all)
  --srcdict=FP, --tgtdict=FP           reuse a dictionary
  --alignfile=FP   alignment file for the training split
  --output-format=binary|raw
  --dtype=u8|i8|i16|u16|i32            element type of binary datasets (default: i32)
  --tokenizer=NAME one of the tokenizers below (default: space)
  --log=debug|info|warn|error
  --config=FILE    JSON file with the same settings (flags take precedence)

Tokenizers:
${tokenizerRegistry.describe().join("\n")}

Options:
  --help, -h       Show this help

Examples:
  bitext preprocess --source-lang=de --target-lang=en --trainpref=data/train --validpref=data/valid --testpref=data/test --destdir=data-bin
  bitext inspect --index=data-bin/train.de-en.de.idx --dict=data-bin/dict.de.txt --count=5
`.trim();

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    process.exit(0);
  }

  const command = args[0];

  if (command === "preprocess") {
    await preprocessCmd(args.slice(1));
  } else if (command === "inspect") {
    await inspectCmd(args.slice(1));
  } else {
    console.error(`Unknown command: ${args.join(" ")}`);
    console.log(USAGE);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
