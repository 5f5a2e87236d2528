/**
 * Random-access reader for datasets written by `IndexedDatasetBuilder`.
 *
 * The index is held in memory; item data is read from the blob on demand,
 * one positioned read per `get()`.
 */
import { closeSync, fstatSync, openSync, readFileSync, readSync } from "node:fs";
import { Effect, type Scope } from "effect";
import {
  ConsistencyError,
  FormatError,
  IoError,
  UsageError,
  type Dtype,
} from "@bitext/core";
import { decodeIndex, elementCodec, type DatasetIndex, type ElementCodec } from "./format.js";

export class IndexedDataset {
  readonly index: DatasetIndex;
  readonly dataPath: string;

  private readonly _fd: number;
  private readonly _codec: ElementCodec;
  private _closed = false;

  private constructor(index: DatasetIndex, dataPath: string, fd: number) {
    this.index = index;
    this.dataPath = dataPath;
    this._fd = fd;
    this._codec = elementCodec(index.dtype);
  }

  /**
   * Open a dataset for reading within the caller's scope. Validates the index
   * and checks that the blob holds exactly `elementCount` elements.
   */
  static open(
    indexPath: string,
    dataPath: string,
  ): Effect.Effect<IndexedDataset, FormatError | ConsistencyError | IoError, Scope.Scope> {
    return Effect.acquireRelease(
      Effect.try({
        try: () => {
          const index = decodeIndex(readFileSync(indexPath), indexPath);
          const fd = openSync(dataPath, "r");
          const expected = index.elementCount * index.elementSize;
          const actual = fstatSync(fd).size;
          if (actual !== expected) {
            closeSync(fd);
            throw new ConsistencyError({
              message: `Data blob is ${actual} bytes, index describes ${expected}`,
              path: dataPath,
            });
          }
          return new IndexedDataset(index, dataPath, fd);
        },
        catch: (cause) =>
          cause instanceof FormatError || cause instanceof ConsistencyError
            ? cause
            : new IoError({ message: "Failed to open dataset", path: indexPath, cause }),
      }),
      (dataset) => Effect.sync(() => dataset.close()),
    );
  }

  get length(): number {
    return this.index.itemCount;
  }

  get dtype(): Dtype {
    return this.index.dtype;
  }

  get elementCount(): number {
    return this.index.elementCount;
  }

  get sizes(): readonly number[] {
    return this.index.sizes;
  }

  /** Element count of item `i`. */
  size(i: number): number {
    this._checkIndex(i);
    return this.index.sizes[i];
  }

  /** Item `i` exactly as it was appended. */
  get(i: number): Int32Array {
    this._checkIndex(i);
    const start = this.index.offsets[i];
    const length = this.index.offsets[i + 1] - start;
    const width = this.index.elementSize;
    const out = new Int32Array(length);
    if (length === 0) return out;

    const buf = Buffer.alloc(length * width);
    let read = 0;
    while (read < buf.length) {
      const n = readSync(this._fd, buf, read, buf.length - read, start * width + read);
      if (n === 0) {
        throw new ConsistencyError({
          message: `Data blob ended inside item ${i}`,
          path: this.dataPath,
        });
      }
      read += n;
    }
    for (let j = 0; j < length; j++) {
      out[j] = this._codec.read(buf, j * width);
    }
    return out;
  }

  *items(): Generator<Int32Array, void, undefined> {
    for (let i = 0; i < this.length; i++) {
      yield this.get(i);
    }
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    closeSync(this._fd);
  }

  private _checkIndex(i: number): void {
    if (this._closed) {
      throw new UsageError({ message: `Dataset ${this.dataPath} is closed` });
    }
    if (!Number.isInteger(i) || i < 0 || i >= this.length) {
      throw new UsageError({ message: `Item index ${i} out of range [0, ${this.length})` });
    }
  }
}
