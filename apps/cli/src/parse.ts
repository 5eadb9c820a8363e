/**
 * Simple arg parsing helpers.
 * Supports --key=value and --flag syntax.
 */
import { ArgumentError } from "@gradlab/core";

export function parseKV(args: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const arg of args) {
    if (arg.startsWith("--")) {
      const eqIdx = arg.indexOf("=");
      if (eqIdx > 0) {
        result[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      } else {
        result[arg.slice(2)] = "true";
      }
    }
  }
  return result;
}

export function intArg(kv: Record<string, string>, key: string, defaultVal: number): number {
  const val = kv[key];
  if (!val) return defaultVal;
  const n = Number(val);
  if (!Number.isInteger(n)) {
    throw new ArgumentError({ message: `--${key} must be an integer, got "${val}"` });
  }
  return n;
}

export function floatArg(kv: Record<string, string>, key: string, defaultVal: number): number {
  const val = kv[key];
  if (!val) return defaultVal;
  const n = Number(val);
  if (Number.isNaN(n)) {
    throw new ArgumentError({ message: `--${key} must be a number, got "${val}"` });
  }
  return n;
}

export function strArg(kv: Record<string, string>, key: string, defaultVal: string): string {
  return kv[key] ?? defaultVal;
}

/**
 * Bench config overrides from flags. Values stay loosely typed here;
 * validateBenchConfig rejects anything malformed.
 */
export function benchOverrides(kv: Record<string, string>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  const num = (key: string, flag = key) => {
    if (kv[flag] !== undefined) out[key] = Number(kv[flag]);
  };
  num("size");
  num("tileSize", "tile");
  num("iters");
  if (kv["layouts"] !== undefined) out["layouts"] = kv["layouts"];
  if (kv["logLevel"] !== undefined) out["logLevel"] = kv["logLevel"];
  return out;
}
