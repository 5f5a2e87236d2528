/**
 * Index artifact codec.
 *
 * Layout (all integers little-endian):
 *   [8 bytes: magic "TNTIDX\0\0"]
 *   [u64: version = 1]
 *   [u64: dtype code]
 *   [u64: element width in bytes]
 *   [u64: item count n]
 *   [u64: element count]
 *   [i64 x (n+1): offsets, in elements, offsets[0] = 0]
 *   [i64 x n: item sizes]
 *
 * The data blob (.bin) holds the items back to back with no separators, each
 * element stored little-endian at the dtype's width.
 */
import {
  ConsistencyError,
  FormatError,
  dtypeBytes,
  dtypeCode,
  dtypeFromCode,
  type Dtype,
} from "@bitext/core";

export const INDEX_MAGIC = Buffer.from("TNTIDX\0\0", "latin1");
export const INDEX_VERSION = 1;
export const HEADER_BYTES = 48;

export interface DatasetIndex {
  readonly dtype: Dtype;
  readonly elementSize: number;
  readonly itemCount: number;
  readonly elementCount: number;
  /** Prefix sums of item lengths; `itemCount + 1` entries. */
  readonly offsets: readonly number[];
  readonly sizes: readonly number[];
}

/** Serialise an index to its on-disk form. */
export function encodeIndex(index: DatasetIndex): Buffer {
  const n = index.itemCount;
  const buf = Buffer.alloc(HEADER_BYTES + (2 * n + 1) * 8);
  INDEX_MAGIC.copy(buf, 0);
  buf.writeBigUInt64LE(BigInt(INDEX_VERSION), 8);
  buf.writeBigUInt64LE(BigInt(dtypeCode(index.dtype)), 16);
  buf.writeBigUInt64LE(BigInt(index.elementSize), 24);
  buf.writeBigUInt64LE(BigInt(n), 32);
  buf.writeBigUInt64LE(BigInt(index.elementCount), 40);

  let pos = HEADER_BYTES;
  for (const offset of index.offsets) {
    buf.writeBigInt64LE(BigInt(offset), pos);
    pos += 8;
  }
  for (const size of index.sizes) {
    buf.writeBigInt64LE(BigInt(size), pos);
    pos += 8;
  }
  return buf;
}

/**
 * Parse and validate an index. Structural damage (magic, version, dtype,
 * truncation) is a `FormatError`; offsets that disagree with the counts or
 * sizes are a `ConsistencyError`.
 */
export function decodeIndex(buf: Buffer, path?: string): DatasetIndex {
  if (buf.length < HEADER_BYTES) {
    throw new FormatError({ message: `Index is truncated: ${buf.length} bytes`, path });
  }
  if (!buf.subarray(0, 8).equals(INDEX_MAGIC)) {
    throw new FormatError({ message: "Index has a bad magic tag", path });
  }
  const version = Number(buf.readBigUInt64LE(8));
  if (version !== INDEX_VERSION) {
    throw new FormatError({ message: `Unsupported index version ${version}`, path });
  }
  const code = Number(buf.readBigUInt64LE(16));
  const dtype = dtypeFromCode(code);
  if (dtype === undefined) {
    throw new FormatError({ message: `Unknown dtype code ${code}`, path });
  }
  const elementSize = Number(buf.readBigUInt64LE(24));
  if (elementSize !== dtypeBytes(dtype)) {
    throw new FormatError({
      message: `Element width ${elementSize} does not match dtype ${dtype} (${dtypeBytes(dtype)})`,
      path,
    });
  }
  const itemCount = Number(buf.readBigUInt64LE(32));
  const elementCount = Number(buf.readBigUInt64LE(40));
  const expected = HEADER_BYTES + (2 * itemCount + 1) * 8;
  if (buf.length !== expected) {
    throw new FormatError({
      message: `Index for ${itemCount} items should be ${expected} bytes, got ${buf.length}`,
      path,
    });
  }

  const offsets: number[] = [];
  let pos = HEADER_BYTES;
  for (let i = 0; i <= itemCount; i++) {
    offsets.push(Number(buf.readBigInt64LE(pos)));
    pos += 8;
  }
  const sizes: number[] = [];
  for (let i = 0; i < itemCount; i++) {
    sizes.push(Number(buf.readBigInt64LE(pos)));
    pos += 8;
  }

  if (offsets[0] !== 0) {
    throw new ConsistencyError({ message: `First offset is ${offsets[0]}, expected 0`, path });
  }
  for (let i = 0; i < itemCount; i++) {
    if (offsets[i + 1] - offsets[i] !== sizes[i] || sizes[i] < 0) {
      throw new ConsistencyError({
        message: `Item ${i}: offsets ${offsets[i]}..${offsets[i + 1]} disagree with size ${sizes[i]}`,
        path,
      });
    }
  }
  if (offsets[itemCount] !== elementCount) {
    throw new ConsistencyError({
      message: `Last offset ${offsets[itemCount]} does not match element count ${elementCount}`,
      path,
    });
  }

  return { dtype, elementSize, itemCount, elementCount, offsets, sizes };
}

// ── Element codec ──────────────────────────────────────────────────────────

export interface ElementCodec {
  write(buf: Buffer, value: number, pos: number): void;
  read(buf: Buffer, pos: number): number;
}

export function elementCodec(dtype: Dtype): ElementCodec {
  switch (dtype) {
    case "u8":
      return { write: (b, v, p) => { b.writeUInt8(v, p); }, read: (b, p) => b.readUInt8(p) };
    case "i8":
      return { write: (b, v, p) => { b.writeInt8(v, p); }, read: (b, p) => b.readInt8(p) };
    case "i16":
      return { write: (b, v, p) => { b.writeInt16LE(v, p); }, read: (b, p) => b.readInt16LE(p) };
    case "u16":
      return { write: (b, v, p) => { b.writeUInt16LE(v, p); }, read: (b, p) => b.readUInt16LE(p) };
    case "i32":
      return { write: (b, v, p) => { b.writeInt32LE(v, p); }, read: (b, p) => b.readInt32LE(p) };
  }
}

/** Conventional `.bin` / `.idx` pair for an output prefix. */
export function datasetPaths(prefix: string): { data: string; index: string } {
  return { data: `${prefix}.bin`, index: `${prefix}.idx` };
}
