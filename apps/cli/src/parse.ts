/**
 * Simple arg parsing helpers.
 * Supports --key=value and --flag syntax.
 */
import { ConfigError } from "@bitext/core";

export function parseKV(args: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const arg of args) {
    if (!arg.startsWith("--")) {
      throw new ConfigError({ message: `Unexpected argument "${arg}" (expected --key=value)` });
    }
    const eqIdx = arg.indexOf("=");
    if (eqIdx > 0) {
      result[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
    } else {
      result[arg.slice(2)] = "true";
    }
  }
  return result;
}

export function requireArg(kv: Record<string, string>, key: string, label?: string): string {
  const val = kv[key];
  if (!val) {
    throw new ConfigError({
      message: `Missing required argument: --${key}${label ? ` (${label})` : ""}`,
    });
  }
  return val;
}

/** Integer argument, or `undefined` when absent. */
export function optIntArg(kv: Record<string, string>, key: string): number | undefined {
  const val = kv[key];
  if (val === undefined) return undefined;
  if (!/^-?\d+$/.test(val)) {
    throw new ConfigError({ message: `--${key} must be an integer, got "${val}"` });
  }
  return parseInt(val, 10);
}

export function intArg(kv: Record<string, string>, key: string, defaultVal: number): number {
  return optIntArg(kv, key) ?? defaultVal;
}

export function strArg(kv: Record<string, string>, key: string, defaultVal: string): string {
  return kv[key] ?? defaultVal;
}

/** Reject flags the command does not know, so typos fail loudly. */
export function checkKnown(kv: Record<string, string>, known: readonly string[]): void {
  const unknown = Object.keys(kv).filter((k) => !known.includes(k));
  if (unknown.length > 0) {
    throw new ConfigError({
      message: `Unknown argument${unknown.length > 1 ? "s" : ""}: ${unknown.map((k) => `--${k}`).join(", ")}`,
    });
  }
}
