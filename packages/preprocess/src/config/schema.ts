/**
 * PreprocessConfig type, defaults and validation.
 */
import { ConfigError, isDtype, type Dtype, type LogLevelName, type OutputFormat } from "@bitext/core";

export interface PreprocessConfig {
  // -- Languages and inputs --
  readonly sourceLang: string;
  readonly targetLang: string;
  readonly trainPref: string;
  /** Comma-separated; empty disables validation output. */
  readonly validPref: string;
  /** Comma-separated; empty disables test output. */
  readonly testPref: string;
  readonly destDir: string;

  // -- Dictionary policy --
  /** Symbols seen fewer times than this map to `<unk>`. */
  readonly thresholdSrc: number;
  readonly thresholdTgt: number;
  /** Maximum corpus symbols to keep; -1 keeps all. */
  readonly nwordsSrc: number;
  readonly nwordsTgt: number;
  /** Reuse an existing dictionary instead of building one. */
  readonly srcDict?: string;
  readonly tgtDict?: string;

  // -- Output --
  readonly alignFile?: string;
  readonly outputFormat: OutputFormat;
  readonly dtype: Dtype;
  readonly tokenizer: string;
  readonly logLevel: LogLevelName;
}

export type PreprocessDefaults = Omit<PreprocessConfig, "sourceLang" | "targetLang">;

export const defaultPreprocessConfig: PreprocessDefaults = {
  trainPref: "train",
  validPref: "valid",
  testPref: "test",
  destDir: "data-bin",
  thresholdSrc: 0,
  thresholdTgt: 0,
  nwordsSrc: -1,
  nwordsTgt: -1,
  outputFormat: "binary",
  dtype: "i32",
  tokenizer: "space",
  logLevel: "info",
};

const OUTPUT_FORMATS: readonly string[] = ["binary", "raw"];
const LOG_LEVELS: readonly string[] = ["debug", "info", "warn", "error"];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.includes(value);
}

export function isLogLevelName(value: string): value is LogLevelName {
  return LOG_LEVELS.includes(value);
}

/** Validate a PreprocessConfig, throwing `ConfigError` on invalid values. */
export function validatePreprocessConfig(config: PreprocessConfig): void {
  if (config.sourceLang.length === 0 || config.targetLang.length === 0) {
    throw new ConfigError({ message: "sourceLang and targetLang must be non-empty" });
  }
  if (config.sourceLang === config.targetLang) {
    throw new ConfigError({
      message: `sourceLang and targetLang must differ, both are "${config.sourceLang}"`,
    });
  }
  if (config.trainPref.length === 0) {
    throw new ConfigError({ message: "trainPref must be non-empty" });
  }
  if (config.destDir.length === 0) {
    throw new ConfigError({ message: "destDir must be non-empty" });
  }
  for (const key of ["thresholdSrc", "thresholdTgt"] as const) {
    if (!Number.isInteger(config[key]) || config[key] < 0) {
      throw new ConfigError({ message: `${key} must be an integer >= 0, got ${config[key]}` });
    }
  }
  for (const key of ["nwordsSrc", "nwordsTgt"] as const) {
    if (!Number.isInteger(config[key]) || config[key] < -1) {
      throw new ConfigError({ message: `${key} must be an integer >= -1, got ${config[key]}` });
    }
  }
  if (!isOutputFormat(config.outputFormat)) {
    throw new ConfigError({
      message: `Invalid output format "${config.outputFormat}". Valid: ${OUTPUT_FORMATS.join(", ")}`,
    });
  }
  if (!isDtype(config.dtype)) {
    throw new ConfigError({ message: `Invalid dtype "${config.dtype}"` });
  }
  if (!isLogLevelName(config.logLevel)) {
    throw new ConfigError({
      message: `Invalid log level "${config.logLevel}". Valid: ${LOG_LEVELS.join(", ")}`,
    });
  }
}
