/**
 * Forward vs reverse mode on a function ℝⁿ → ℝ.
 *
 * Forward mode needs one pass per input to recover the full gradient;
 * reverse mode needs one forward evaluation plus one backward sweep.
 */
import { ArgumentError } from "@gradlab/core";
import { reverse, variable, constant, type Dual, type Scalar } from "@gradlab/autograd";

export interface GradBenchResult {
  n: number;
  iters: number;
  forwardMs: number;
  reverseMs: number;
  /** Largest |forward − reverse| over all partials of the last iteration. */
  maxDiff: number;
}

/** Σ xᵢ² · sin(xᵢ) */
export function sumSquaresSin<T extends Scalar<T>>(xs: readonly T[]): T {
  let acc = xs[0].pow(2).mul(xs[0].sin());
  for (let i = 1; i < xs.length; i++) acc = acc.add(xs[i].pow(2).mul(xs[i].sin()));
  return acc;
}

function forwardGradient(point: readonly number[]): number[] {
  const grads: number[] = new Array(point.length);
  for (let k = 0; k < point.length; k++) {
    const xs: Dual[] = point.map((x, i) => (i === k ? variable(x) : constant(x)));
    grads[k] = sumSquaresSin(xs).grad;
  }
  return grads;
}

function reverseGradient(point: readonly number[]): number[] {
  return reverse.gradient((...xs) => sumSquaresSin(xs), point).grads;
}

export function benchGradient(n: number, iters = 100): GradBenchResult {
  if (!Number.isInteger(n) || n <= 0 || !Number.isInteger(iters) || iters <= 0) {
    throw new ArgumentError({ message: `n and iters must be positive integers, got n=${n} iters=${iters}` });
  }
  const point = Array.from({ length: n }, (_, i) => 0.1 + i / n);

  let fwd: number[] = [];
  let start = performance.now();
  for (let i = 0; i < iters; i++) fwd = forwardGradient(point);
  const forwardMs = performance.now() - start;

  let rev: number[] = [];
  start = performance.now();
  for (let i = 0; i < iters; i++) rev = reverseGradient(point);
  const reverseMs = performance.now() - start;

  let maxDiff = 0;
  for (let i = 0; i < n; i++) maxDiff = Math.max(maxDiff, Math.abs(fwd[i] - rev[i]));
  return { n, iters, forwardMs, reverseMs, maxDiff };
}
