/**
 * Symbol <-> index mapping with occurrence counts.
 *
 * Four reserved symbols always sit at the same low indices, whatever the
 * corpus: `<s>` = 0, `<pad>` = 1, `</s>` = 2, `<unk>` = 3. Corpus symbols get
 * dense indices after them, first in order of first appearance and, after
 * `finalize()`, in order of descending frequency.
 */
import { ConsistencyError, FormatError, UsageError } from "@bitext/core";

export const BOS_WORD = "<s>";
export const PAD_WORD = "<pad>";
export const EOS_WORD = "</s>";
export const UNK_WORD = "<unk>";

export interface DictionaryEntry {
  readonly index: number;
  readonly symbol: string;
  readonly count: number;
}

export class Dictionary {
  readonly bosIndex = 0;
  readonly padIndex = 1;
  readonly eosIndex = 2;
  readonly unkIndex = 3;
  /** Number of reserved symbols at the head of the table. */
  readonly nspecial = 4;

  /** index -> symbol */
  private _symbols: string[] = [];

  /** index -> occurrence count */
  private _counts: number[] = [];

  /** symbol -> index */
  private _indices = new Map<string, number>();

  /** Set by `finalize()` and by loading; blocks `add()`. */
  private _sealed = false;

  constructor() {
    for (const word of [BOS_WORD, PAD_WORD, EOS_WORD, UNK_WORD]) {
      this._push(word, 1);
    }
  }

  // ── Queries ──────────────────────────────────────────────────────────────

  get size(): number {
    return this._symbols.length;
  }

  get sealed(): boolean {
    return this._sealed;
  }

  get unkWord(): string {
    return UNK_WORD;
  }

  has(symbol: string): boolean {
    return this._indices.has(symbol);
  }

  /** Index of `symbol`, or `unkIndex` when it is not in the table. */
  lookup(symbol: string): number {
    return this._indices.get(symbol) ?? this.unkIndex;
  }

  /** Symbol at `index`, or the unknown word when the index is out of range. */
  symbol(index: number): string {
    return this._symbols[index] ?? UNK_WORD;
  }

  count(index: number): number {
    return this._counts[index] ?? 0;
  }

  isReserved(index: number): boolean {
    return index >= 0 && index < this.nspecial;
  }

  /** All entries in index order, reserved symbols included. */
  entries(): DictionaryEntry[] {
    return this._symbols.map((symbol, index) => ({
      index,
      symbol,
      count: this._counts[index],
    }));
  }

  /**
   * Turn a sequence of indices back into text. Padding is always dropped;
   * end-of-sentence markers are dropped unless `stripEos` is false.
   */
  string(ids: ArrayLike<number>, options: { stripEos?: boolean } = {}): string {
    const stripEos = options.stripEos ?? true;
    const words: string[] = [];
    for (let i = 0; i < ids.length; i++) {
      const id = ids[i];
      if (id === this.padIndex) continue;
      if (stripEos && id === this.eosIndex) continue;
      words.push(this.symbol(id));
    }
    return words.join(" ");
  }

  // ── Mutation ─────────────────────────────────────────────────────────────

  /** Register `symbol` if new and bump its count. Returns its index. */
  add(symbol: string): number {
    if (this._sealed) {
      throw new UsageError({
        message: `Cannot add "${symbol}": dictionary is finalized`,
      });
    }
    const existing = this._indices.get(symbol);
    if (existing !== undefined) {
      this._counts[existing] += 1;
      return existing;
    }
    return this._push(symbol, 1);
  }

  /**
   * Prune and reorder the corpus symbols, then seal the table.
   *
   * 1. Drop symbols seen fewer than `threshold` times (0 keeps everything).
   * 2. Sort the rest by count, descending; equal counts keep their current order.
   * 3. Keep only the first `maxSize` of them when `maxSize >= 0`.
   * 4. Renumber densely after the reserved block.
   *
   * Reserved symbols are never dropped and never count against `maxSize`.
   */
  finalize(threshold = 0, maxSize = -1): void {
    const kept = this._keptAbove(threshold);
    kept.sort((a, b) => this._counts[b] - this._counts[a] || a - b);
    this._rebuild(maxSize >= 0 ? kept.slice(0, maxSize) : kept);
  }

  /**
   * Drop symbols below `threshold` and keep at most `maxSize` of the rest,
   * without reordering. Used on loaded listings, whose order already fixes
   * the numbering. Seals the table.
   */
  prune(threshold = 0, maxSize = -1): void {
    const kept = this._keptAbove(threshold);
    this._rebuild(maxSize >= 0 ? kept.slice(0, maxSize) : kept);
  }

  private _keptAbove(threshold: number): number[] {
    const kept: number[] = [];
    for (let i = this.nspecial; i < this._symbols.length; i++) {
      if (this._counts[i] >= threshold) kept.push(i);
    }
    return kept;
  }

  /** Renumber so that `retained` follows the reserved block, then seal. */
  private _rebuild(retained: readonly number[]): void {
    const symbols = this._symbols.slice(0, this.nspecial);
    const counts = this._counts.slice(0, this.nspecial);
    for (const i of retained) {
      symbols.push(this._symbols[i]);
      counts.push(this._counts[i]);
    }

    this._symbols = symbols;
    this._counts = counts;
    this._indices.clear();
    for (let i = 0; i < symbols.length; i++) {
      this._indices.set(symbols[i], i);
    }
    this._sealed = true;
  }

  // ── Persisted listing ────────────────────────────────────────────────────

  /** One `"<symbol> <count>"` line per corpus symbol, in index order. */
  toListing(): string {
    let out = "";
    for (let i = this.nspecial; i < this._symbols.length; i++) {
      out += `${this._symbols[i]} ${this._counts[i]}\n`;
    }
    return out;
  }

  /**
   * Rebuild a dictionary from a listing produced by `toListing()`.
   * Indices follow line order after the reserved block; the result is sealed.
   */
  static parse(content: string, path?: string): Dictionary {
    const dict = new Dictionary();
    const lines = content.split("\n");
    if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();

    for (let i = 0; i < lines.length; i++) {
      const lineNo = i + 1;
      const line = lines[i].endsWith("\r") ? lines[i].slice(0, -1) : lines[i];
      const fields = line.split(" ");
      if (fields.length !== 2 || fields[0].length === 0) {
        throw new FormatError({
          message: `Expected "<symbol> <count>", got ${JSON.stringify(line)}`,
          path,
          line: lineNo,
        });
      }
      const [symbol, countText] = fields;
      if (!/^\d+$/.test(countText)) {
        throw new FormatError({
          message: `Count for "${symbol}" is not a non-negative integer: ${JSON.stringify(countText)}`,
          path,
          line: lineNo,
        });
      }
      if (dict._indices.has(symbol)) {
        throw new ConsistencyError({
          message: `Duplicate symbol "${symbol}" (already at index ${dict._indices.get(symbol)})`,
          path,
          line: lineNo,
        });
      }
      dict._push(symbol, Number(countText));
    }

    dict._sealed = true;
    return dict;
  }

  // ── Internal ─────────────────────────────────────────────────────────────

  private _push(symbol: string, count: number): number {
    const index = this._symbols.length;
    this._symbols.push(symbol);
    this._counts.push(count);
    this._indices.set(symbol, index);
    return index;
  }
}
