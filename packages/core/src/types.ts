/**
 * Core types for gradlab.
 */

// ── Shape helpers ──────────────────────────────────────────────────────────
export type Shape = readonly number[];

export function shapeSize(shape: Shape): number {
  let s = 1;
  for (const d of shape) s *= d;
  return s;
}

export function shapeEquals(a: Shape, b: Shape): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function formatShape(shape: Shape): string {
  return `(${shape.join(", ")})`;
}

/** Round up to the next multiple of `tile`. */
export function padTo(n: number, tile: number): number {
  return Math.ceil(n / tile) * tile;
}

// ── Nested lists ───────────────────────────────────────────────────────────
/** The only list shapes the tensor packages import and export. */
export type NestedList = number[] | number[][];

// ── Layouts ────────────────────────────────────────────────────────────────
export const LAYOUT_NAMES = ["row_major", "col_major", "tiled"] as const;

export type LayoutName = (typeof LAYOUT_NAMES)[number];

export function isLayoutName(name: string): name is LayoutName {
  return (LAYOUT_NAMES as readonly string[]).includes(name);
}

// ── Log levels ─────────────────────────────────────────────────────────────
export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevelName = (typeof LOG_LEVELS)[number];

export function isLogLevelName(name: string): name is LogLevelName {
  return (LOG_LEVELS as readonly string[]).includes(name);
}

// ── Benchmark config ───────────────────────────────────────────────────────
export interface BenchConfig {
  /** Side length of the square benchmark matrix. */
  readonly size: number;
  readonly tileSize: number;
  readonly iters: number;
  readonly layouts: readonly LayoutName[];
  readonly logLevel: LogLevelName;
}

export const defaultBenchConfig: BenchConfig = {
  size: 256,
  tileSize: 16,
  iters: 1000,
  layouts: LAYOUT_NAMES,
  logLevel: "info",
};
