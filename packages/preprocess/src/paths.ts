/**
 * File naming conventions for preprocessed output.
 */
import { join } from "node:path";

export interface SplitJob {
  /** Input prefix; the language is appended as an extension. */
  readonly prefix: string;
  /** Output split name: `train`, `valid`, `valid1`, `test`, ... */
  readonly split: string;
}

export function inputPath(prefix: string, lang: string): string {
  return `${prefix}.${lang}`;
}

export function dictPath(destDir: string, lang: string): string {
  return join(destDir, `dict.${lang}.txt`);
}

/** `<destDir>/<split>.<src>-<tgt>.<lang>`, to which `.bin` / `.idx` are added. */
export function binaryPrefix(
  destDir: string,
  split: string,
  sourceLang: string,
  targetLang: string,
  lang: string,
): string {
  return join(destDir, `${split}.${sourceLang}-${targetLang}.${lang}`);
}

export function rawPath(destDir: string, split: string, lang: string): string {
  return join(destDir, `${split}.${lang}`);
}

export function alignmentPath(destDir: string, sourceLang: string, targetLang: string): string {
  return join(destDir, `alignment.${sourceLang}-${targetLang}.txt`);
}

/**
 * Expand a comma-separated prefix list into split jobs. The first prefix
 * keeps the bare split name, later ones are numbered: `valid`, `valid1`, ...
 * An empty list yields no jobs.
 */
export function splitPrefixes(split: string, prefixes: string): SplitJob[] {
  return prefixes
    .split(",")
    .map((p) => p.trim())
    .filter((p) => p.length > 0)
    .map((prefix, k) => ({ prefix, split: k > 0 ? `${split}${k}` : split }));
}
