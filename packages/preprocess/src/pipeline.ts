/**
 * End-to-end preprocessing of a parallel corpus.
 *
 * Pure orchestration: builds or loads one dictionary per language, writes
 * them out, binarizes (or copies) every split, and optionally derives the
 * alignment prior from the training split.
 */
import { copyFile, mkdir } from "node:fs/promises";
import { Effect } from "effect";
import {
  IoError,
  UsageError,
  bestFittingDtype,
  dtypeRange,
  type ConsistencyError,
  type FormatError,
  type TokenizerService,
} from "@bitext/core";
import {
  buildDictionary,
  loadDictionary,
  saveDictionary,
  type Dictionary,
} from "@bitext/dictionary";
import { IndexedDatasetBuilder, datasetPaths, type DatasetSummary } from "@bitext/dataset";
import { binarize, formatBinarizeReport, type BinarizeStats } from "./binarize.js";
import { aggregateAlignments, formatAlignments, writeAlignments } from "./alignment.js";
import {
  alignmentPath,
  binaryPrefix,
  dictPath,
  inputPath,
  rawPath,
  splitPrefixes,
  type SplitJob,
} from "./paths.js";
import type { PreprocessConfig } from "./config/schema.js";

export type PreprocessError = FormatError | ConsistencyError | UsageError | IoError;

export interface DictionaryReport {
  readonly lang: string;
  readonly path: string;
  /** Total symbols, reserved ones included. */
  readonly size: number;
}

export interface FileReport {
  readonly split: string;
  readonly lang: string;
  readonly input: string;
  readonly format: "binary" | "raw";
  /** Binary mode only. */
  readonly stats?: BinarizeStats;
  readonly dataset?: DatasetSummary;
  /** Raw mode only. */
  readonly output?: string;
}

export interface PreprocessSummary {
  readonly source: DictionaryReport;
  readonly target: DictionaryReport;
  readonly files: readonly FileReport[];
  readonly alignment?: { readonly path: string; readonly entries: number };
}

/** All split jobs in processing order: train, valid*, test*. */
export function splitJobs(config: PreprocessConfig): SplitJob[] {
  return [
    { prefix: config.trainPref, split: "train" },
    ...splitPrefixes("valid", config.validPref),
    ...splitPrefixes("test", config.testPref),
  ];
}

/** Build from the training file, or load the given listing. */
function obtainDictionary(
  trainFile: string,
  reusePath: string | undefined,
): Effect.Effect<Dictionary, PreprocessError, TokenizerService> {
  if (reusePath) {
    return Effect.zipLeft(
      loadDictionary(reusePath),
      Effect.logInfo(`| Reusing dictionary ${reusePath}`),
    );
  }
  return buildDictionary(trainFile);
}

/** Binarize one (split, language) file into its `.bin` / `.idx` pair. */
export function makeBinaryDataset(
  input: string,
  outputPrefix: string,
  dict: Dictionary,
  dtype: PreprocessConfig["dtype"],
): Effect.Effect<{ stats: BinarizeStats; dataset: DatasetSummary }, PreprocessError, TokenizerService> {
  const paths = datasetPaths(outputPrefix);
  return Effect.scoped(
    Effect.gen(function* () {
      const builder = yield* IndexedDatasetBuilder.open(paths.data, dtype, paths.index);
      const stats = yield* binarize(input, dict, (ids) => builder.addItem(ids));
      const dataset = yield* builder.finalize(paths.index);
      return { stats, dataset };
    }),
  ).pipe(Effect.withSpan("binarize", { attributes: { input } }));
}

export function preprocess(
  config: PreprocessConfig,
): Effect.Effect<PreprocessSummary, PreprocessError, TokenizerService> {
  return Effect.gen(function* () {
    const { sourceLang: src, targetLang: tgt, destDir } = config;

    yield* Effect.tryPromise({
      try: () => mkdir(destDir, { recursive: true }),
      catch: (cause) => new IoError({ message: "Failed to create output directory", path: destDir, cause }),
    });
    yield* Effect.logInfo(`| Preprocessing ${src}-${tgt} into ${destDir}`);

    // ── Dictionaries ────────────────────────────────────────────────────
    const srcDict = yield* obtainDictionary(inputPath(config.trainPref, src), config.srcDict);
    yield* saveDictionary(dictPath(destDir, src), srcDict, config.thresholdSrc, config.nwordsSrc);
    const tgtDict = yield* obtainDictionary(inputPath(config.trainPref, tgt), config.tgtDict);
    yield* saveDictionary(dictPath(destDir, tgt), tgtDict, config.thresholdTgt, config.nwordsTgt);

    // Everything downstream reads the dictionaries back from disk, so the
    // encodings match what a later consumer of destDir will see.
    const srcSaved = yield* loadDictionary(dictPath(destDir, src));
    const tgtSaved = yield* loadDictionary(dictPath(destDir, tgt));
    for (const [lang, dict] of [[src, srcSaved], [tgt, tgtSaved]] as const) {
      yield* Effect.logInfo(`| [${lang}] Dictionary: ${dict.size - dict.nspecial} types`);
    }
    const dictFor = (lang: string): Dictionary => (lang === src ? srcSaved : tgtSaved);

    if (config.outputFormat === "binary") {
      for (const [lang, dict] of [[src, srcSaved], [tgt, tgtSaved]] as const) {
        if (dict.size - 1 > dtypeRange(config.dtype)[1]) {
          return yield* Effect.fail(
            new UsageError({
              message: `dtype ${config.dtype} cannot hold the ${dict.size} symbols of the ${lang} dictionary; use ${bestFittingDtype(dict.size)}`,
            }),
          );
        }
      }
    }

    // ── Splits ──────────────────────────────────────────────────────────
    const files: FileReport[] = [];
    for (const job of splitJobs(config)) {
      for (const lang of [src, tgt]) {
        const input = inputPath(job.prefix, lang);
        if (config.outputFormat === "raw") {
          const output = rawPath(destDir, job.split, lang);
          yield* Effect.tryPromise({
            try: () => copyFile(input, output),
            catch: (cause) => new IoError({ message: `Failed to copy to ${output}`, path: input, cause }),
          });
          files.push({ split: job.split, lang, input, format: "raw", output });
          continue;
        }
        const dict = dictFor(lang);
        const { stats, dataset } = yield* makeBinaryDataset(
          input,
          binaryPrefix(destDir, job.split, src, tgt, lang),
          dict,
          config.dtype,
        );
        yield* Effect.logInfo(formatBinarizeReport(lang, input, stats, dict));
        files.push({ split: job.split, lang, input, format: "binary", stats, dataset });
      }
    }
    yield* Effect.logInfo(`| Wrote preprocessed data to ${destDir}`);

    // ── Alignment prior ─────────────────────────────────────────────────
    let alignment: PreprocessSummary["alignment"];
    if (config.alignFile) {
      const table = yield* aggregateAlignments(
        inputPath(config.trainPref, src),
        inputPath(config.trainPref, tgt),
        config.alignFile,
        srcSaved,
        tgtSaved,
      );
      const lines = formatAlignments(table.best(), srcSaved, tgtSaved);
      const path = alignmentPath(destDir, src, tgt);
      yield* writeAlignments(path, lines);
      yield* Effect.logInfo(`| Wrote ${lines.length} alignment entries to ${path}`);
      alignment = { path, entries: lines.length };
    }

    return {
      source: { lang: src, path: dictPath(destDir, src), size: srcSaved.size },
      target: { lang: tgt, path: dictPath(destDir, tgt), size: tgtSaved.size },
      files,
      alignment,
    } satisfies PreprocessSummary;
  });
}
