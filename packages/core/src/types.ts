/**
 * Core types for the bitext system.
 */

// ── Element dtype ──────────────────────────────────────────────────────────
export type Dtype = "u8" | "i8" | "i16" | "u16" | "i32";

export const DTYPES: readonly Dtype[] = ["u8", "i8", "i16", "u16", "i32"];

export function isDtype(value: string): value is Dtype {
  return (DTYPES as readonly string[]).includes(value);
}

export function dtypeBytes(d: Dtype): number {
  switch (d) {
    case "u8":
    case "i8": return 1;
    case "i16":
    case "u16": return 2;
    case "i32": return 4;
  }
}

/** Inclusive value range each dtype can hold. */
export function dtypeRange(d: Dtype): readonly [number, number] {
  switch (d) {
    case "u8": return [0, 0xff];
    case "i8": return [-0x80, 0x7f];
    case "i16": return [-0x8000, 0x7fff];
    case "u16": return [0, 0xffff];
    case "i32": return [-0x80000000, 0x7fffffff];
  }
}

/** Type codes written into the index header. */
const DTYPE_CODES: Readonly<Record<Dtype, number>> = {
  u8: 1,
  i8: 2,
  i16: 3,
  i32: 4,
  u16: 8,
};

export function dtypeCode(d: Dtype): number {
  return DTYPE_CODES[d];
}

export function dtypeFromCode(code: number): Dtype | undefined {
  return DTYPES.find((d) => DTYPE_CODES[d] === code);
}

/** Smallest dtype that holds every index of a vocabulary of this size. */
export function bestFittingDtype(vocabSize: number): Dtype {
  return vocabSize < 65500 ? "u16" : "i32";
}

// ── Output format ──────────────────────────────────────────────────────────
export type OutputFormat = "binary" | "raw";

export type LogLevelName = "debug" | "info" | "warn" | "error";
