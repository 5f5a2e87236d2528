/**
 * Load PreprocessConfig from an optional JSON file, merge with defaults and
 * overrides, and validate.
 */
import { readFile } from "node:fs/promises";
import { Effect } from "effect";
import { ConfigError, isDtype } from "@bitext/core";
import {
  defaultPreprocessConfig,
  isLogLevelName,
  isOutputFormat,
  validatePreprocessConfig,
  type PreprocessConfig,
} from "./schema.js";

export type ConfigOverrides = { -readonly [K in keyof PreprocessConfig]?: PreprocessConfig[K] };

const STRING_KEYS = [
  "sourceLang",
  "targetLang",
  "trainPref",
  "validPref",
  "testPref",
  "destDir",
  "srcDict",
  "tgtDict",
  "alignFile",
  "tokenizer",
] as const;

const INT_KEYS = ["thresholdSrc", "thresholdTgt", "nwordsSrc", "nwordsTgt"] as const;

/**
 * Pick the known keys out of a parsed JSON object, checking their types.
 * Unknown keys are rejected so typos do not pass silently.
 */
export function coerceConfig(raw: unknown, source: string): ConfigOverrides {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ConfigError({ message: `${source}: expected a JSON object` });
  }
  const out: ConfigOverrides = {};
  for (const [key, value] of Object.entries(raw)) {
    const stringKey = STRING_KEYS.find((k) => k === key);
    const intKey = INT_KEYS.find((k) => k === key);
    if (stringKey !== undefined) {
      if (typeof value !== "string") {
        throw new ConfigError({ message: `${source}: "${key}" must be a string` });
      }
      out[stringKey] = value;
    } else if (intKey !== undefined) {
      if (typeof value !== "number" || !Number.isInteger(value)) {
        throw new ConfigError({ message: `${source}: "${key}" must be an integer` });
      }
      out[intKey] = value;
    } else if (key === "outputFormat") {
      if (typeof value !== "string" || !isOutputFormat(value)) {
        throw new ConfigError({ message: `${source}: "outputFormat" must be "binary" or "raw"` });
      }
      out.outputFormat = value;
    } else if (key === "dtype") {
      if (typeof value !== "string" || !isDtype(value)) {
        throw new ConfigError({ message: `${source}: invalid "dtype" ${JSON.stringify(value)}` });
      }
      out.dtype = value;
    } else if (key === "logLevel") {
      if (typeof value !== "string" || !isLogLevelName(value)) {
        throw new ConfigError({ message: `${source}: invalid "logLevel" ${JSON.stringify(value)}` });
      }
      out.logLevel = value;
    } else {
      throw new ConfigError({ message: `${source}: unknown key "${key}"` });
    }
  }
  return out;
}

/** Merge defaults, file values and overrides (later wins), then validate. */
export function resolvePreprocessConfig(...layers: ConfigOverrides[]): PreprocessConfig {
  const merged: ConfigOverrides = { ...defaultPreprocessConfig };
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) Object.assign(merged, { [key]: value });
    }
  }
  const { sourceLang, targetLang } = merged;
  if (sourceLang === undefined || targetLang === undefined) {
    throw new ConfigError({ message: "Both a source and a target language are required" });
  }
  const config: PreprocessConfig = { ...defaultPreprocessConfig, ...merged, sourceLang, targetLang };
  validatePreprocessConfig(config);
  return config;
}

/** Load a PreprocessConfig from an optional JSON file plus overrides. */
export function loadPreprocessConfig(
  path: string | undefined,
  overrides: ConfigOverrides = {},
): Effect.Effect<PreprocessConfig, ConfigError> {
  return Effect.tryPromise({
    try: async () => {
      if (!path) return resolvePreprocessConfig(overrides);
      const raw = await readFile(path, "utf-8");
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (cause) {
        throw new ConfigError({ message: `Failed to parse config at ${path}: invalid JSON`, cause });
      }
      return resolvePreprocessConfig(coerceConfig(parsed, path), overrides);
    },
    catch: (cause) =>
      cause instanceof ConfigError
        ? cause
        : new ConfigError({ message: `Failed to read config at ${path}`, cause }),
  });
}
