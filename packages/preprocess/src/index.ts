/**
 * @bitext/preprocess -- binarization, alignment priors and the pipeline
 * that ties them together.
 */
export {
  encodeLine,
  binarize,
  unknownRate,
  formatBinarizeReport,
  type EncodeOptions,
  type BinarizeStats,
} from "./binarize.js";
export {
  AlignmentFrequencyTable,
  aggregateAlignments,
  parseAlignmentLine,
  formatAlignments,
  writeAlignments,
  type AlignmentPair,
} from "./alignment.js";
export {
  inputPath,
  dictPath,
  binaryPrefix,
  rawPath,
  alignmentPath,
  splitPrefixes,
  type SplitJob,
} from "./paths.js";
export {
  preprocess,
  makeBinaryDataset,
  splitJobs,
  type PreprocessError,
  type PreprocessSummary,
  type FileReport,
  type DictionaryReport,
} from "./pipeline.js";
export {
  defaultPreprocessConfig,
  validatePreprocessConfig,
  isOutputFormat,
  isLogLevelName,
  type PreprocessConfig,
  type PreprocessDefaults,
} from "./config/schema.js";
export {
  coerceConfig,
  resolvePreprocessConfig,
  loadPreprocessConfig,
  type ConfigOverrides,
} from "./config/load.js";
