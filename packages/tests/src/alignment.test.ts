import { readFileSync } from "node:fs";
import { join } from "node:path";
import { describe, it, expect } from "vitest";
import { FormatError } from "@bitext/core";
import { Dictionary } from "@bitext/dictionary";
import {
  AlignmentFrequencyTable,
  aggregateAlignments,
  formatAlignments,
  parseAlignmentLine,
  writeAlignments,
} from "@bitext/preprocess";
import { run, runError, scratchDir, writeText } from "./helpers.js";

describe("parseAlignmentLine", () => {
  it("parses position pairs", () => {
    expect(parseAlignmentLine("0-0 1-2  2-1")).toEqual([
      [0, 0],
      [1, 2],
      [2, 1],
    ]);
  });

  it("treats a blank line as no pairs", () => {
    expect(parseAlignmentLine("")).toEqual([]);
    expect(parseAlignmentLine("   ")).toEqual([]);
  });

  it("rejects malformed tokens with their location", () => {
    expect(() => parseAlignmentLine("0-0 1:1", "train.align", 7)).toThrow(FormatError);
    expect(() => parseAlignmentLine("0-")).toThrow(FormatError);
    expect(() => parseAlignmentLine("-1-0")).toThrow(FormatError);
    try {
      parseAlignmentLine("1:1", "train.align", 7);
    } catch (e) {
      expect(e instanceof FormatError && e.line).toBe(7);
    }
  });
});

describe("AlignmentFrequencyTable", () => {
  it("keeps the most frequent target per source", () => {
    const t = new AlignmentFrequencyTable();
    t.increment(5, 9);
    t.increment(5, 8);
    t.increment(5, 8);
    t.increment(4, 7);
    expect(t.count(5, 8)).toBe(2);
    expect(t.count(5, 6)).toBe(0);
    expect(t.sources()).toEqual([4, 5]);
    expect([...t.best()]).toEqual([
      [4, 7],
      [5, 8],
    ]);
  });

  it("breaks ties toward the lowest target index", () => {
    const t = new AlignmentFrequencyTable();
    t.increment(4, 9);
    t.increment(4, 6);
    expect(t.best().get(4)).toBe(6);
  });
});

describe("aggregateAlignments", () => {
  /** a=4, b=5 and x=4, y=5 */
  function dicts(): [Dictionary, Dictionary] {
    return [Dictionary.parse("a 1\nb 1\n"), Dictionary.parse("x 1\ny 1\n")];
  }

  function files(src: string, tgt: string, align: string) {
    const dir = scratchDir();
    return {
      dir,
      src: writeText(dir, "train.s", src),
      tgt: writeText(dir, "train.t", tgt),
      align: writeText(dir, "train.align", align),
    };
  }

  it("counts aligned index pairs and formats the best ones", async () => {
    const [s, t] = dicts();
    const f = files("a b\n", "x y\n", "0-0 0-1 1-1\n");
    const table = await run(aggregateAlignments(f.src, f.tgt, f.align, s, t));
    expect(table.count(4, 4)).toBe(1);
    expect(table.count(4, 5)).toBe(1);
    expect(table.count(5, 5)).toBe(1);
    expect(formatAlignments(table.best(), s, t)).toEqual(["a x", "b y"]);
  });

  it("accumulates over lines", async () => {
    const [s, t] = dicts();
    const f = files("a b\nb a\n", "x y\nx y\n", "0-1 1-0\n0-0 1-1\n");
    const table = await run(aggregateAlignments(f.src, f.tgt, f.align, s, t));
    expect(table.count(4, 5)).toBe(2);
    expect(table.count(5, 4)).toBe(2);
    expect(formatAlignments(table.best(), s, t)).toEqual(["a y", "b x"]);
  });

  it("skips pairs that touch <unk>", async () => {
    const [s, t] = dicts();
    const f = files("a zz\n", "qq y\n", "0-0 1-1 0-1\n");
    const table = await run(aggregateAlignments(f.src, f.tgt, f.align, s, t));
    expect(table.size).toBe(1);
    expect([...table.best()]).toEqual([[4, 5]]);
  });

  it("rejects a pair that lands on end-of-sentence", async () => {
    const [s, t] = dicts();
    const f = files("a b\n", "x y\n", "0-2\n");
    const err = await runError(aggregateAlignments(f.src, f.tgt, f.align, s, t));
    expect(err._tag).toBe("ConsistencyError");
  });

  it("rejects a pair that lands on a literal <pad>", async () => {
    const [s, t] = dicts();
    const f = files("a <pad>\n", "x y\n", "1-1\n");
    const err = await runError(aggregateAlignments(f.src, f.tgt, f.align, s, t));
    expect(err._tag).toBe("ConsistencyError");
  });

  it("rejects a position past the end of the line", async () => {
    const [s, t] = dicts();
    const f = files("a b\n", "x y\n", "0-3\n");
    const err = await runError(aggregateAlignments(f.src, f.tgt, f.align, s, t));
    expect(err._tag).toBe("ConsistencyError");
    if (err._tag === "ConsistencyError") expect(err.line).toBe(1);
  });

  it("rejects files with different line counts", async () => {
    const [s, t] = dicts();
    const f = files("a\nb\n", "x\ny\n", "0-0\n");
    const err = await runError(aggregateAlignments(f.src, f.tgt, f.align, s, t));
    expect(err._tag).toBe("ConsistencyError");
    if (err._tag === "ConsistencyError") expect(err.line).toBe(2);
  });

  it("passes malformed alignment lines through as FormatError", async () => {
    const [s, t] = dicts();
    const f = files("a\n", "x\n", "0:0\n");
    const err = await runError(aggregateAlignments(f.src, f.tgt, f.align, s, t));
    expect(err._tag).toBe("FormatError");
  });

  it("writes one line per entry", async () => {
    const dir = scratchDir();
    const path = join(dir, "alignment.s-t.txt");
    await run(writeAlignments(path, ["a x", "b y"]));
    expect(readFileSync(path, "utf-8")).toBe("a x\nb y\n");
  });
});
