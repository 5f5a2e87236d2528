import { readFileSync } from "node:fs";
import { join } from "node:path";
import { describe, it, expect } from "vitest";
import { ConsistencyError, FormatError, UsageError } from "@bitext/core";
import {
  Dictionary,
  buildDictionary,
  loadDictionary,
  saveDictionary,
} from "@bitext/dictionary";
import { run, runError, scratchDir, writeText } from "./helpers.js";

const CORPUS = "the cat sat\nthe dog sat\nthe cat\n";

function fromWords(words: string[]): Dictionary {
  const d = new Dictionary();
  for (const w of words) d.add(w);
  return d;
}

describe("Dictionary", () => {
  it("reserves the first four indices", () => {
    const d = new Dictionary();
    expect(d.size).toBe(4);
    expect([d.bosIndex, d.padIndex, d.eosIndex, d.unkIndex]).toEqual([0, 1, 2, 3]);
    expect([0, 1, 2, 3].map((i) => d.symbol(i))).toEqual(["<s>", "<pad>", "</s>", "<unk>"]);
    expect(d.isReserved(3)).toBe(true);
    expect(d.isReserved(4)).toBe(false);
  });

  it("assigns dense indices in order of first appearance and counts repeats", () => {
    const d = fromWords(["b", "a", "b"]);
    expect(d.lookup("b")).toBe(4);
    expect(d.lookup("a")).toBe(5);
    expect(d.count(4)).toBe(2);
    expect(d.count(5)).toBe(1);
  });

  it("maps unseen words to <unk> without adding them", () => {
    const d = fromWords(["a"]);
    expect(d.lookup("zzz")).toBe(d.unkIndex);
    expect(d.size).toBe(5);
    expect(d.has("zzz")).toBe(false);
  });

  it("decodes index sequences", () => {
    const d = fromWords(["hello", "world"]);
    expect(d.string([4, 5, 2])).toBe("hello world");
    expect(d.string([4, 1, 5, 2], { stripEos: false })).toBe("hello world </s>");
    expect(d.symbol(99)).toBe("<unk>");
  });

  describe("finalize", () => {
    it("keeps every word when no threshold or cap is set", () => {
      const d = fromWords(["the", "cat", "sat", "the", "dog", "sat", "the", "cat"]);
      d.finalize(0, -1);
      expect(d.entries().slice(4).map((e) => [e.symbol, e.count])).toEqual([
        ["the", 3],
        ["cat", 2],
        ["sat", 2],
        ["dog", 1],
      ]);
      expect(d.size).toBe(8);
    });

    it("sorts by count and breaks ties by first appearance", () => {
      const d = fromWords(["b", "a", "a", "b", "c"]);
      d.finalize();
      expect(d.lookup("b")).toBe(4);
      expect(d.lookup("a")).toBe(5);
      expect(d.lookup("c")).toBe(6);
    });

    it("drops words below the threshold and keeps indices dense", () => {
      const d = fromWords(["the", "cat", "sat", "the", "dog", "sat", "the", "cat"]);
      d.finalize(2);
      expect(d.size).toBe(7);
      expect(d.lookup("dog")).toBe(d.unkIndex);
      expect(d.entries().map((e) => e.index)).toEqual([0, 1, 2, 3, 4, 5, 6]);
    });

    it("caps the number of corpus words but never the reserved ones", () => {
      const d = fromWords(["the", "cat", "sat", "the", "dog", "sat", "the", "cat"]);
      d.finalize(0, 2);
      expect(d.size).toBe(6);
      expect(d.symbol(4)).toBe("the");
      expect(d.symbol(5)).toBe("cat");
      expect(d.lookup("sat")).toBe(d.unkIndex);

      const empty = fromWords(["x"]);
      empty.finalize(0, 0);
      expect(empty.size).toBe(4);
    });

    it("seals the dictionary against further additions", () => {
      const d = fromWords(["a"]);
      d.finalize();
      expect(d.sealed).toBe(true);
      expect(() => d.add("b")).toThrow(UsageError);
    });

    it("is idempotent", () => {
      const d = fromWords(["b", "a", "a"]);
      d.finalize();
      const first = d.toListing();
      d.finalize();
      expect(d.toListing()).toBe(first);
    });
  });

  describe("prune", () => {
    it("keeps index order while applying threshold and cap", () => {
      const d = Dictionary.parse("ein 1\nhaus 5\nboot 3\nauto 2\n");
      d.prune(2, 2);
      expect(d.toListing()).toBe("haus 5\nboot 3\n");
      expect(d.lookup("haus")).toBe(4);
      expect(d.lookup("boot")).toBe(5);
      expect(d.lookup("ein")).toBe(d.unkIndex);
    });

    it("leaves an unsorted listing untouched when nothing is dropped", () => {
      const d = Dictionary.parse("ein 1\nhaus 5\n");
      d.prune();
      expect(d.toListing()).toBe("ein 1\nhaus 5\n");
    });
  });

  describe("parse", () => {
    it("assigns indices in file order after the reserved block", () => {
      const d = Dictionary.parse("zebra 1\napple 7\n");
      expect(d.lookup("zebra")).toBe(4);
      expect(d.lookup("apple")).toBe(5);
      expect(d.count(5)).toBe(7);
      expect(d.sealed).toBe(true);
    });

    it("accepts CRLF line endings and a missing final newline", () => {
      const d = Dictionary.parse("a 2\r\nb 1");
      expect(d.entries().slice(4).map((e) => e.symbol)).toEqual(["a", "b"]);
    });

    it("rejects lines with the wrong number of fields", () => {
      expect.assertions(4);
      expect(() => Dictionary.parse("a 1\nb\n", "d.txt")).toThrow(FormatError);
      try {
        Dictionary.parse("a 1\nb 2 3\n", "d.txt");
      } catch (e) {
        expect(e).toBeInstanceOf(FormatError);
        if (e instanceof FormatError) {
          expect(e.line).toBe(2);
          expect(e.path).toBe("d.txt");
        }
      }
    });

    it("rejects a non-numeric count", () => {
      expect(() => Dictionary.parse("a x\n")).toThrow(FormatError);
    });

    it("rejects duplicate symbols, reserved ones included", () => {
      expect(() => Dictionary.parse("a 1\na 2\n")).toThrow(ConsistencyError);
      expect(() => Dictionary.parse("<unk> 5\n")).toThrow(ConsistencyError);
    });
  });
});

describe("dictionary persistence", () => {
  it("builds counts over the whole file", async () => {
    const dir = scratchDir();
    const train = writeText(dir, "train.en", CORPUS);
    const d = await run(buildDictionary(train));
    expect(d.sealed).toBe(false);
    expect(d.count(d.lookup("the"))).toBe(3);
    expect(d.count(d.lookup("cat"))).toBe(2);
    expect(d.count(d.lookup("dog"))).toBe(1);
    expect(d.size).toBe(8);
  });

  it("saves the finalized listing without reserved symbols", async () => {
    const dir = scratchDir();
    const train = writeText(dir, "train.en", CORPUS);
    const out = join(dir, "nested", "dict.en.txt");
    const d = await run(buildDictionary(train));
    await run(saveDictionary(out, d, 0, -1));
    expect(readFileSync(out, "utf-8")).toBe("the 3\ncat 2\nsat 2\ndog 1\n");
  });

  it("applies threshold and cap when saving", async () => {
    const dir = scratchDir();
    const train = writeText(dir, "train.en", CORPUS);
    const out = join(dir, "dict.en.txt");
    const d = await run(buildDictionary(train));
    await run(saveDictionary(out, d, 2, 1));
    expect(readFileSync(out, "utf-8")).toBe("the 3\n");
  });

  it("round-trips through save and load", async () => {
    const dir = scratchDir();
    const train = writeText(dir, "train.en", CORPUS);
    const out = join(dir, "dict.en.txt");
    const d = await run(buildDictionary(train));
    await run(saveDictionary(out, d));
    const loaded = await run(loadDictionary(out));
    expect(loaded.entries()).toEqual(d.entries());
  });

  it("saves a loaded listing without renumbering it", async () => {
    const dir = scratchDir();
    const given = writeText(dir, "given.txt", "ein 1\nhaus 5\nboot 3\n");
    const out = join(dir, "dict.de.txt");
    const d = await run(loadDictionary(given));
    await run(saveDictionary(out, d, 2));
    expect(readFileSync(out, "utf-8")).toBe("haus 5\nboot 3\n");
  });

  it("fails with the offending line when a listing is malformed", async () => {
    const dir = scratchDir();
    const path = writeText(dir, "dict.txt", "a 1\nbroken\n");
    const err = await runError(loadDictionary(path));
    expect(err._tag).toBe("FormatError");
    if (err._tag === "FormatError") {
      expect(err.line).toBe(2);
      expect(err.path).toBe(path);
    }
  });

  it("fails with an IoError for a missing file", async () => {
    const dir = scratchDir();
    const err = await runError(loadDictionary(join(dir, "missing.txt")));
    expect(err._tag).toBe("IoError");
  });
});
