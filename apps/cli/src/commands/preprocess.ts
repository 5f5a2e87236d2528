/**
 * Command: bitext preprocess
 */
import { Effect } from "effect";
import { ConfigError, isDtype, type PipelineError } from "@bitext/core";
import {
  isLogLevelName,
  isOutputFormat,
  loadPreprocessConfig,
  preprocess,
  type ConfigOverrides,
  type PreprocessSummary,
} from "@bitext/preprocess";
import { TokenizerNamed, withLogging } from "@bitext/effect-runtime";
import { checkKnown, optIntArg, parseKV } from "../parse.js";
import { asConfigError, runCommand } from "../run.js";

const STRING_FLAGS = {
  "source-lang": "sourceLang",
  "target-lang": "targetLang",
  trainpref: "trainPref",
  validpref: "validPref",
  testpref: "testPref",
  destdir: "destDir",
  srcdict: "srcDict",
  tgtdict: "tgtDict",
  alignfile: "alignFile",
  tokenizer: "tokenizer",
} as const;

const INT_FLAGS = {
  thresholdsrc: "thresholdSrc",
  thresholdtgt: "thresholdTgt",
  nwordssrc: "nwordsSrc",
  nwordstgt: "nwordsTgt",
} as const;

const OTHER_FLAGS = ["output-format", "dtype", "log", "config"] as const;

/** Translate `--flag=value` pairs into config overrides. */
export function preprocessOverrides(kv: Record<string, string>): ConfigOverrides {
  checkKnown(kv, [...Object.keys(STRING_FLAGS), ...Object.keys(INT_FLAGS), ...OTHER_FLAGS]);
  const overrides: ConfigOverrides = {};

  for (const [flag, key] of Object.entries(STRING_FLAGS)) {
    const val = kv[flag];
    if (val !== undefined) overrides[key] = val;
  }
  for (const [flag, key] of Object.entries(INT_FLAGS)) {
    const val = optIntArg(kv, flag);
    if (val !== undefined) overrides[key] = val;
  }

  const format = kv["output-format"];
  if (format !== undefined) {
    if (!isOutputFormat(format)) {
      throw new ConfigError({ message: `--output-format must be "binary" or "raw", got "${format}"` });
    }
    overrides.outputFormat = format;
  }
  const dtype = kv["dtype"];
  if (dtype !== undefined) {
    if (!isDtype(dtype)) {
      throw new ConfigError({ message: `Invalid --dtype "${dtype}"` });
    }
    overrides.dtype = dtype;
  }
  const log = kv["log"];
  if (log !== undefined) {
    if (!isLogLevelName(log)) {
      throw new ConfigError({ message: `Invalid --log "${log}"` });
    }
    overrides.logLevel = log;
  }
  return overrides;
}

export function preprocessProgram(args: string[]): Effect.Effect<PreprocessSummary, PipelineError> {
  return Effect.gen(function* () {
    const kv = yield* Effect.try({ try: () => parseKV(args), catch: asConfigError });
    const overrides = yield* Effect.try({ try: () => preprocessOverrides(kv), catch: asConfigError });
    const config = yield* loadPreprocessConfig(kv["config"], overrides);
    return yield* preprocess(config).pipe(
      Effect.provide(TokenizerNamed(config.tokenizer)),
      withLogging(config.logLevel),
    );
  });
}

export async function preprocessCmd(args: string[]): Promise<void> {
  await runCommand(preprocessProgram(args), (summary) => {
    const files = summary.files.length;
    console.log(`Done: ${files} file${files === 1 ? "" : "s"} written`);
  });
}
