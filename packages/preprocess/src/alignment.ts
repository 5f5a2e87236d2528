/**
 * Alignment prior.
 *
 * Reads a source file, a target file and a word-alignment file (`"i-j"`
 * pairs, 0-based word positions) in lockstep, counts how often each source
 * index is aligned to each target index, and keeps the most frequent target
 * per source.
 */
import { writeFile } from "node:fs/promises";
import { Effect } from "effect";
import {
  ConsistencyError,
  FormatError,
  IoError,
  TokenizerService,
  keepTypedOr,
  readLines,
  type UsageError,
} from "@bitext/core";
import type { Dictionary } from "@bitext/dictionary";
import { encodeLine } from "./binarize.js";

const PAIR_RE = /^(\d+)-(\d+)$/;

export type AlignmentPair = readonly [srcPos: number, tgtPos: number];

/** Parse `"0-0 1-2 2-1"` into position pairs. A blank line has no pairs. */
export function parseAlignmentLine(line: string, path?: string, lineNo?: number): AlignmentPair[] {
  const pairs: AlignmentPair[] = [];
  for (const token of line.trim().split(/\s+/)) {
    if (token.length === 0) continue;
    const m = PAIR_RE.exec(token);
    if (!m) {
      throw new FormatError({
        message: `Malformed alignment pair ${JSON.stringify(token)}, expected "<srcPos>-<tgtPos>"`,
        path,
        line: lineNo,
      });
    }
    pairs.push([Number(m[1]), Number(m[2])]);
  }
  return pairs;
}

// ── Frequency table ────────────────────────────────────────────────────────

export class AlignmentFrequencyTable {
  /** src index -> (tgt index -> count) */
  private readonly _freq = new Map<number, Map<number, number>>();

  increment(src: number, tgt: number): void {
    let row = this._freq.get(src);
    if (!row) {
      row = new Map();
      this._freq.set(src, row);
    }
    row.set(tgt, (row.get(tgt) ?? 0) + 1);
  }

  count(src: number, tgt: number): number {
    return this._freq.get(src)?.get(tgt) ?? 0;
  }

  /** Target counts for `src`, ordered by target index. */
  targets(src: number): [tgt: number, count: number][] {
    const row = this._freq.get(src);
    if (!row) return [];
    return [...row.entries()].sort((a, b) => a[0] - b[0]);
  }

  /** Source indices with at least one counted pair, ascending. */
  sources(): number[] {
    return [...this._freq.keys()].sort((a, b) => a - b);
  }

  /** Number of distinct source indices. */
  get size(): number {
    return this._freq.size;
  }

  /**
   * Most frequent target per source, keyed in ascending source order.
   * Equal counts go to the lowest target index.
   */
  best(): Map<number, number> {
    const out = new Map<number, number>();
    for (const src of this.sources()) {
      let bestTgt = -1;
      let bestCount = 0;
      for (const [tgt, count] of this.targets(src)) {
        if (count > bestCount) {
          bestTgt = tgt;
          bestCount = count;
        }
      }
      out.set(src, bestTgt);
    }
    return out;
  }
}

// ── Aggregation ────────────────────────────────────────────────────────────

/**
 * Count aligned index pairs over three parallel files.
 *
 * Pairs touching `<unk>` on either side are skipped. A pair landing on
 * `<pad>`, `</s>` or past the end of its line means the alignment does not
 * belong to these sentences and aborts with a `ConsistencyError`, as does
 * one file running out of lines before the others.
 */
export function aggregateAlignments(
  sourcePath: string,
  targetPath: string,
  alignPath: string,
  srcDict: Dictionary,
  tgtDict: Dictionary,
): Effect.Effect<AlignmentFrequencyTable, FormatError | ConsistencyError | UsageError | IoError, TokenizerService> {
  return Effect.gen(function* () {
    const tokenizer = yield* TokenizerService;
    const table = yield* Effect.tryPromise({
      try: async () => {
        const table = new AlignmentFrequencyTable();
        const src = readLines(sourcePath);
        const tgt = readLines(targetPath);
        const aln = readLines(alignPath);
        try {
          for (let lineNo = 1; ; lineNo++) {
            const [s, t, a] = await Promise.all([src.next(), tgt.next(), aln.next()]);
            if (s.done && t.done && a.done) break;
            if (s.done || t.done || a.done) {
              const ended = [
                s.done ? sourcePath : undefined,
                t.done ? targetPath : undefined,
                a.done ? alignPath : undefined,
              ].filter((p): p is string => p !== undefined);
              throw new ConsistencyError({
                message: `Line count mismatch: ${ended.join(", ")} ended after ${lineNo - 1} lines while the other files continue`,
                path: alignPath,
                line: lineNo,
              });
            }

            const si = encodeLine(s.value, srcDict, tokenizer);
            const ti = encodeLine(t.value, tgtDict, tokenizer);
            for (const [sp, tp] of parseAlignmentLine(a.value, alignPath, lineNo)) {
              if (sp >= si.length || tp >= ti.length) {
                throw new ConsistencyError({
                  message: `Pair ${sp}-${tp} is outside the sentence pair (${si.length - 1} source, ${ti.length - 1} target words)`,
                  path: alignPath,
                  line: lineNo,
                });
              }
              const srcIdx = si[sp];
              const tgtIdx = ti[tp];
              if (srcIdx === srcDict.unkIndex || tgtIdx === tgtDict.unkIndex) continue;
              if (
                srcIdx === srcDict.padIndex ||
                srcIdx === srcDict.eosIndex ||
                tgtIdx === tgtDict.padIndex ||
                tgtIdx === tgtDict.eosIndex
              ) {
                throw new ConsistencyError({
                  message: `Pair ${sp}-${tp} resolves to a padding or end-of-sentence symbol (${srcDict.symbol(srcIdx)} -> ${tgtDict.symbol(tgtIdx)})`,
                  path: alignPath,
                  line: lineNo,
                });
              }
              table.increment(srcIdx, tgtIdx);
            }
          }
        } finally {
          await Promise.all([src.return(), tgt.return(), aln.return()]);
        }
        return table;
      },
      catch: keepTypedOr(alignPath, `aggregate alignments from "${alignPath}"`),
    });
    yield* Effect.logDebug(`Aligned ${table.size} source symbols from ${alignPath}`);
    return table;
  });
}

/** `"<srcSymbol> <tgtSymbol>"` per entry, in the map's order. */
export function formatAlignments(
  best: ReadonlyMap<number, number>,
  srcDict: Dictionary,
  tgtDict: Dictionary,
): string[] {
  const lines: string[] = [];
  for (const [src, tgt] of best) {
    lines.push(`${srcDict.symbol(src)} ${tgtDict.symbol(tgt)}`);
  }
  return lines;
}

export function writeAlignments(path: string, lines: readonly string[]): Effect.Effect<void, IoError> {
  return Effect.tryPromise({
    try: () => writeFile(path, lines.map((l) => `${l}\n`).join(""), "utf-8"),
    catch: (cause) => new IoError({ message: "Failed to write alignment table", path, cause }),
  });
}
