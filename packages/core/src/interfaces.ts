/**
 * Subsystem interfaces (ports). Tensor backends implement these.
 */
import type { NestedList, Shape } from "./types.js";

// ── Tensor (lightweight handle) ────────────────────────────────────────────
/** Dense row-major tensor of float64 values. */
export interface TensorData {
  readonly shape: Shape;
  readonly data: Float64Array;
}

// ── Backend ────────────────────────────────────────────────────────────────
export interface Backend {
  readonly name: string;

  // creation
  zeros(shape: number | Shape): TensorData;
  fromList(list: NestedList): TensorData;

  // element-wise (identical shapes only; there is no broadcasting)
  add(a: TensorData, b: TensorData): TensorData;
  mul(a: TensorData, b: TensorData): TensorData;

  // linear algebra
  matmul(a: TensorData, b: TensorData): TensorData;

  // reduction
  sum(a: TensorData): number;

  // export
  toList(a: TensorData): NestedList;
  format(a: TensorData): string;
}
