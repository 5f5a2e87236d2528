import { describe, it, expect } from "vitest";
import { Dictionary, buildDictionary } from "@bitext/dictionary";
import { WhitespaceTokenizer } from "@bitext/tokenizers";
import {
  binarize,
  encodeLine,
  formatBinarizeReport,
  unknownRate,
  type BinarizeStats,
} from "@bitext/preprocess";
import { run, runError, scratchDir, writeText } from "./helpers.js";

const CORPUS = "the cat sat\nthe dog sat\nthe cat\n";

/** the=4, cat=5, sat=6, dog=7 */
async function trainedDictionary(): Promise<Dictionary> {
  const dir = scratchDir();
  const d = await run(buildDictionary(writeText(dir, "train.en", CORPUS)));
  d.finalize();
  return d;
}

function collect(): { items: number[][]; consumer: (ids: Int32Array) => void } {
  const items: number[][] = [];
  return { items, consumer: (ids) => items.push(Array.from(ids)) };
}

describe("encodeLine", () => {
  const tok = new WhitespaceTokenizer();

  it("appends the end-of-sentence index", async () => {
    const d = await trainedDictionary();
    expect(Array.from(encodeLine("the cat", d, tok))).toEqual([4, 5, 2]);
    expect(Array.from(encodeLine("", d, tok))).toEqual([2]);
  });

  it("extends the vocabulary only when asked", () => {
    const d = new Dictionary();
    expect(Array.from(encodeLine("x y x", d, tok))).toEqual([3, 3, 3, 2]);
    expect(d.size).toBe(4);
    expect(Array.from(encodeLine("x y x", d, tok, { extendVocabulary: true }))).toEqual([4, 5, 4, 2]);
    expect(d.count(4)).toBe(2);
  });

  it("reports each word with its resolved index", async () => {
    const d = await trainedDictionary();
    const seen: [string, number][] = [];
    encodeLine("cat bird", d, tok, { onWord: (w, i) => seen.push([w, i]) });
    expect(seen).toEqual([
      ["cat", 5],
      ["bird", 3],
    ]);
  });
});

describe("binarize", () => {
  it("emits one item per line, blank lines included", async () => {
    const d = await trainedDictionary();
    const dir = scratchDir();
    const path = writeText(dir, "valid.en", "the bird sat\n\nthe <unk>\n");
    const { items, consumer } = collect();

    const stats = await run(binarize(path, d, consumer));
    expect(items).toEqual([[4, 3, 6, 2], [2], [4, 3, 2]]);
    expect(stats.sentences).toBe(3);
    expect(stats.tokens).toBe(8);
    expect(stats.unknowns).toBe(1);
    expect([...stats.replaced]).toEqual([["bird", 1]]);
  });

  it("leaves the dictionary untouched", async () => {
    const d = await trainedDictionary();
    const before = d.toListing();
    const dir = scratchDir();
    const { consumer } = collect();
    await run(binarize(writeText(dir, "x.en", "new words here\n"), d, consumer));
    expect(d.toListing()).toBe(before);
    expect(d.size).toBe(8);
  });

  it("counts repeated replacements per word", async () => {
    const d = await trainedDictionary();
    const dir = scratchDir();
    const { consumer } = collect();
    const stats = await run(binarize(writeText(dir, "x.en", "fox fox cat\nfox owl\n"), d, consumer));
    expect(stats.unknowns).toBe(4);
    expect(stats.replaced.get("fox")).toBe(3);
    expect(stats.replaced.get("owl")).toBe(1);
  });

  it("fails with an IoError when the input is missing", async () => {
    const d = await trainedDictionary();
    const dir = scratchDir();
    const { consumer } = collect();
    const err = await runError(binarize(`${dir}/missing.en`, d, consumer));
    expect(err._tag).toBe("IoError");
  });
});

describe("binarize report", () => {
  const stats: BinarizeStats = {
    sentences: 3,
    tokens: 8,
    unknowns: 1,
    replaced: new Map([["bird", 1]]),
  };

  it("computes the unknown rate over emitted elements", () => {
    expect(unknownRate(stats)).toBe(0.125);
    expect(unknownRate({ sentences: 0, tokens: 0, unknowns: 0, replaced: new Map() })).toBe(0);
  });

  it("formats one summary line", () => {
    expect(formatBinarizeReport("en", "data/valid.en", stats, new Dictionary())).toBe(
      "| [en] data/valid.en: 3 sents, 8 tokens, 12.50% replaced by <unk>",
    );
  });
});
