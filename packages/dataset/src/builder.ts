/**
 * Append-only writer for binarized datasets.
 *
 * Items go straight to the data blob in fixed-width chunks; only their
 * lengths stay in memory. Nothing describes the blob until `finalize()`
 * writes the index, so a run that dies before then leaves no valid dataset.
 */
import { closeSync, openSync, renameSync, rmSync, writeFileSync, writeSync } from "node:fs";
import { Effect, type Scope } from "effect";
import {
  IoError,
  UsageError,
  dtypeBytes,
  dtypeRange,
  type Dtype,
} from "@bitext/core";
import { elementCodec, encodeIndex, type DatasetIndex, type ElementCodec } from "./format.js";

/** Bytes buffered before a write to the data file. */
const CHUNK_BYTES = 1 << 20;

export interface DatasetSummary {
  readonly dtype: Dtype;
  readonly itemCount: number;
  readonly elementCount: number;
  readonly dataPath: string;
  readonly indexPath: string;
}

export class IndexedDatasetBuilder {
  readonly dataPath: string;
  readonly dtype: Dtype;

  private readonly _fd: number;
  private readonly _width: number;
  private readonly _range: readonly [number, number];
  private readonly _codec: ElementCodec;

  private readonly _chunk = Buffer.alloc(CHUNK_BYTES);
  private _chunkBytes = 0;

  /** offsets[i] = element position where item i starts. */
  private readonly _offsets: number[] = [0];

  private _sealed = false;
  private _closed = false;

  private constructor(dataPath: string, fd: number, dtype: Dtype) {
    this.dataPath = dataPath;
    this._fd = fd;
    this.dtype = dtype;
    this._width = dtypeBytes(dtype);
    this._range = dtypeRange(dtype);
    this._codec = elementCodec(dtype);
  }

  /**
   * Create (or truncate) the data file and remove any index left by an
   * earlier run, so the old index never describes the new blob. The builder
   * lives in the caller's scope: when the scope closes, buffered bytes are
   * flushed and the file is closed, whether or not the surrounding effect
   * succeeded.
   */
  static open(
    dataPath: string,
    dtype: Dtype = "i32",
    indexPath: string = dataPath.replace(/\.bin$/, "") + ".idx",
  ): Effect.Effect<IndexedDatasetBuilder, IoError, Scope.Scope> {
    return Effect.acquireRelease(
      Effect.try({
        try: () => {
          rmSync(indexPath, { force: true });
          rmSync(`${indexPath}.tmp`, { force: true });
          return new IndexedDatasetBuilder(dataPath, openSync(dataPath, "w"), dtype);
        },
        catch: (cause) =>
          new IoError({ message: `Failed to open dataset for writing`, path: dataPath, cause }),
      }),
      (builder) =>
        Effect.sync(() => builder._close()).pipe(
          Effect.catchAllDefect((defect) =>
            Effect.logWarning("Closing dataset failed").pipe(
              Effect.annotateLogs({ path: dataPath, defect: String(defect) }),
            ),
          ),
        ),
    );
  }

  get itemCount(): number {
    return this._offsets.length - 1;
  }

  get elementCount(): number {
    return this._offsets[this._offsets.length - 1];
  }

  get sealed(): boolean {
    return this._sealed;
  }

  /**
   * Append one item. Every value must be an integer that fits the dtype.
   * Empty items are allowed and take no space in the blob.
   */
  addItem(values: ArrayLike<number>): void {
    this._assertWritable("append to");
    const [min, max] = this._range;
    for (let i = 0; i < values.length; i++) {
      const v = values[i];
      if (!Number.isInteger(v) || v < min || v > max) {
        throw new UsageError({
          message: `Item ${this.itemCount}, position ${i}: ${v} does not fit dtype ${this.dtype}`,
        });
      }
    }

    const bytes = values.length * this._width;
    if (this._chunkBytes + bytes > this._chunk.length) this._flush();

    if (bytes > this._chunk.length) {
      const big = Buffer.alloc(bytes);
      for (let i = 0; i < values.length; i++) {
        this._codec.write(big, values[i], i * this._width);
      }
      this._writeAll(big, bytes);
    } else {
      for (let i = 0; i < values.length; i++) {
        this._codec.write(this._chunk, values[i], this._chunkBytes);
        this._chunkBytes += this._width;
      }
    }

    this._offsets.push(this.elementCount + values.length);
  }

  /**
   * Flush the blob and write the index next to it, then seal the builder.
   * The index is written to a temporary name and renamed into place.
   */
  finalize(indexPath: string): Effect.Effect<DatasetSummary, UsageError | IoError> {
    return Effect.try({
      try: () => {
        this._assertWritable("finalize");
        this._flush();

        const sizes: number[] = [];
        for (let i = 0; i < this.itemCount; i++) {
          sizes.push(this._offsets[i + 1] - this._offsets[i]);
        }
        const index: DatasetIndex = {
          dtype: this.dtype,
          elementSize: this._width,
          itemCount: this.itemCount,
          elementCount: this.elementCount,
          offsets: this._offsets,
          sizes,
        };

        const tmp = `${indexPath}.tmp`;
        writeFileSync(tmp, encodeIndex(index));
        renameSync(tmp, indexPath);
        this._sealed = true;

        return {
          dtype: this.dtype,
          itemCount: index.itemCount,
          elementCount: index.elementCount,
          dataPath: this.dataPath,
          indexPath,
        } satisfies DatasetSummary;
      },
      catch: (cause) =>
        cause instanceof UsageError || cause instanceof IoError
          ? cause
          : new IoError({ message: "Failed to write dataset index", path: indexPath, cause }),
    });
  }

  // ── Internal ─────────────────────────────────────────────────────────────

  private _assertWritable(action: string): void {
    if (this._sealed) {
      throw new UsageError({ message: `Cannot ${action} ${this.dataPath}: dataset is finalized` });
    }
    if (this._closed) {
      throw new UsageError({ message: `Cannot ${action} ${this.dataPath}: builder is closed` });
    }
  }

  private _flush(): void {
    if (this._chunkBytes === 0) return;
    this._writeAll(this._chunk, this._chunkBytes);
    this._chunkBytes = 0;
  }

  private _writeAll(buf: Buffer, length: number): void {
    try {
      let written = 0;
      while (written < length) {
        written += writeSync(this._fd, buf, written, length - written);
      }
    } catch (cause) {
      throw new IoError({ message: "Failed to write dataset data", path: this.dataPath, cause });
    }
  }

  private _close(): void {
    if (this._closed) return;
    try {
      this._flush();
    } finally {
      this._closed = true;
      closeSync(this._fd);
    }
  }
}
