/**
 * Traversal micro-benchmarks for LayoutTensor.
 *
 * Each benchmark sums every cell `iters` times in a fixed order. Summing
 * through get(i, j) row by row is sequential for row-major storage and
 * strided for column-major; column by column is the reverse. The raw walk
 * is always sequential and includes the tiled layout's padding zeros.
 */
import { ArgumentError, formatShape, type BenchConfig, type LayoutName } from "@gradlab/core";
import { LayoutTensor, parseLayout } from "@gradlab/tensor";

export interface SumTiming {
  /** Total of one full traversal. */
  sum: number;
  /** Wall time for all iterations. */
  timeMs: number;
}

export interface BenchResult {
  name: string;
  layout: LayoutName;
  shape: string;
  sum: number;
  timeMs: number;
  iters: number;
}

function checkIters(iters: number): void {
  if (!Number.isInteger(iters) || iters <= 0) {
    throw new ArgumentError({ message: `iters must be a positive integer, got ${iters}` });
  }
}

function timeSum(traverse: () => number, iters: number): SumTiming {
  checkIters(iters);
  let sum = 0;
  const start = performance.now();
  for (let i = 0; i < iters; i++) sum = traverse();
  return { sum, timeMs: performance.now() - start };
}

/** i outer, j inner, through the layout-aware accessor. */
export function benchmarkRowSum(t: LayoutTensor, iters = 1000): SumTiming {
  const [rows, cols] = t.shape;
  return timeSum(() => {
    let s = 0;
    for (let i = 0; i < rows; i++) {
      for (let j = 0; j < cols; j++) s += t.get(i, j);
    }
    return s;
  }, iters);
}

/** j outer, i inner, through the layout-aware accessor. */
export function benchmarkColSum(t: LayoutTensor, iters = 1000): SumTiming {
  const [rows, cols] = t.shape;
  return timeSum(() => {
    let s = 0;
    for (let j = 0; j < cols; j++) {
      for (let i = 0; i < rows; i++) s += t.get(i, j);
    }
    return s;
  }, iters);
}

/** Linear walk over the storage buffer, padding included. */
export function benchmarkRawSequential(t: LayoutTensor, iters = 1000): SumTiming {
  const data = t.data;
  return timeSum(() => {
    let s = 0;
    for (let k = 0; k < data.length; k++) s += data[k];
    return s;
  }, iters);
}

/** A size × size tensor whose cell (i, j) holds i*size + j. */
export function rampTensor(size: number, layout: string, tileSize: number): LayoutTensor {
  const t = new LayoutTensor(size, size, parseLayout(layout), tileSize);
  for (let i = 0; i < size; i++) {
    for (let j = 0; j < size; j++) t.set(i, j, i * size + j);
  }
  return t;
}

const SUITE = [
  ["row_sum", benchmarkRowSum],
  ["col_sum", benchmarkColSum],
  ["raw_sequential", benchmarkRawSequential],
] as const;

/** Every traversal on every configured layout. */
export function runLayoutBenches(
  config: Pick<BenchConfig, "size" | "tileSize" | "iters" | "layouts">,
): BenchResult[] {
  const results: BenchResult[] = [];
  for (const layout of config.layouts) {
    const t = rampTensor(config.size, layout, config.tileSize);
    for (const [name, bench] of SUITE) {
      const { sum, timeMs } = bench(t, config.iters);
      results.push({ name, layout, shape: formatShape(t.shape), sum, timeMs, iters: config.iters });
    }
  }
  return results;
}
