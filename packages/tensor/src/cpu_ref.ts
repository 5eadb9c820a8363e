/**
 * cpu_ref -- Reference CPU backend for dense row-major tensors.
 *
 * Every operation is implemented with straightforward loops over
 * Float64Arrays. Element-wise ops require identical shapes (there is no
 * broadcasting), matmul takes exactly two 2-D operands, and nested-list
 * import/export covers rank 1 and rank 2 only.
 */

import {
  type Backend,
  type TensorData,
  type Shape,
  type NestedList,
  ArgumentError,
  ShapeError,
  NotSupportedError,
  describeValue,
  formatShape,
  shapeEquals,
  shapeSize,
} from "@gradlab/core";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeTensor(shape: Shape, data: Float64Array): TensorData {
  return { shape, data };
}

function allocTensor(shape: Shape): TensorData {
  return makeTensor(shape, new Float64Array(shapeSize(shape)));
}

function normalizeShape(shape: number | Shape): Shape {
  const dims = typeof shape === "number" ? [shape] : [...shape];
  if (dims.length === 0) {
    throw new ArgumentError({ message: "shape must have at least one dimension" });
  }
  for (const d of dims) {
    if (!Number.isInteger(d) || d <= 0) {
      throw new ArgumentError({ message: `shape ${formatShape(dims)} has a non-positive or non-integer dimension` });
    }
  }
  return dims;
}

function checkNumber(v: unknown, where: string): number {
  if (typeof v !== "number") {
    throw new ArgumentError({ message: `${where} is ${describeValue(v)}, expected a number` });
  }
  return v;
}

function elementwise(
  op: string,
  a: TensorData,
  b: TensorData,
  fn: (x: number, y: number) => number,
): TensorData {
  if (!shapeEquals(a.shape, b.shape)) {
    throw new ShapeError({
      message: `${op}: shape mismatch ${formatShape(a.shape)} vs ${formatShape(b.shape)}`,
    });
  }
  const out = new Float64Array(a.data.length);
  for (let i = 0; i < out.length; i++) {
    out[i] = fn(a.data[i], b.data[i]);
  }
  return makeTensor(a.shape, out);
}

// ---------------------------------------------------------------------------
// CpuRefBackend
// ---------------------------------------------------------------------------

export class CpuRefBackend implements Backend {
  readonly name = "cpu_ref";

  // ── creation ────────────────────────────────────────────────────────────

  zeros(shape: number | Shape): TensorData {
    return allocTensor(normalizeShape(shape));
  }

  /** A flat list gives a 1-D tensor; a list of rows gives a 2-D tensor. */
  fromList(list: NestedList): TensorData {
    if (!Array.isArray(list) || list.length === 0) {
      throw new ArgumentError({ message: `Expected a non-empty list, got ${describeValue(list)}` });
    }
    const first: unknown = list[0];

    if (!Array.isArray(first)) {
      const data = new Float64Array(list.length);
      for (let i = 0; i < list.length; i++) data[i] = checkNumber(list[i], `Element ${i}`);
      return makeTensor([list.length], data);
    }

    const rows = list.length;
    const cols = first.length;
    if (cols === 0) {
      throw new ArgumentError({ message: "Rows must not be empty" });
    }
    const data = new Float64Array(rows * cols);
    for (let i = 0; i < rows; i++) {
      const row: unknown = list[i];
      if (!Array.isArray(row)) {
        throw new ShapeError({ message: `Row ${i} is ${describeValue(row)}, expected a list` });
      }
      if (row.length !== cols) {
        throw new ShapeError({ message: `Row ${i} has ${row.length} entries, expected ${cols}` });
      }
      for (let j = 0; j < cols; j++) {
        data[i * cols + j] = checkNumber(row[j], `Cell (${i}, ${j})`);
      }
    }
    return makeTensor([rows, cols], data);
  }

  // ── element-wise ────────────────────────────────────────────────────────

  add(a: TensorData, b: TensorData): TensorData {
    return elementwise("add", a, b, (x, y) => x + y);
  }

  mul(a: TensorData, b: TensorData): TensorData {
    return elementwise("mul", a, b, (x, y) => x * y);
  }

  // ── linear algebra ──────────────────────────────────────────────────────

  matmul(a: TensorData, b: TensorData): TensorData {
    if (a.shape.length !== 2 || b.shape.length !== 2) {
      throw new ShapeError({
        message: `matmul requires 2-D tensors, got ${formatShape(a.shape)} x ${formatShape(b.shape)}`,
      });
    }
    const [M, K] = a.shape;
    const [K2, N] = b.shape;
    if (K !== K2) {
      throw new ShapeError({
        message: `matmul inner dimensions must match: ${formatShape(a.shape)} x ${formatShape(b.shape)}`,
      });
    }

    const out = new Float64Array(M * N);
    for (let m = 0; m < M; m++) {
      for (let n = 0; n < N; n++) {
        let sum = 0;
        for (let k = 0; k < K; k++) {
          sum += a.data[m * K + k] * b.data[k * N + n];
        }
        out[m * N + n] = sum;
      }
    }
    return makeTensor([M, N], out);
  }

  // ── reduction ───────────────────────────────────────────────────────────

  sum(a: TensorData): number {
    let s = 0;
    for (let i = 0; i < a.data.length; i++) s += a.data[i];
    return s;
  }

  // ── export ──────────────────────────────────────────────────────────────

  toList(a: TensorData): NestedList {
    if (a.shape.length === 1) {
      return Array.from(a.data);
    }
    if (a.shape.length === 2) {
      const [rows, cols] = a.shape;
      const out: number[][] = new Array(rows);
      for (let i = 0; i < rows; i++) {
        out[i] = Array.from(a.data.subarray(i * cols, (i + 1) * cols));
      }
      return out;
    }
    throw new NotSupportedError({
      message: `toList supports 1-D and 2-D tensors only, got shape ${formatShape(a.shape)}`,
    });
  }

  /** Shape plus the first six values, e.g. `Tensor(shape=(2, 2), data=[1, 2, 3, 4])`. */
  format(a: TensorData): string {
    const head = Array.from(a.data.subarray(0, 6)).join(", ");
    const more = a.data.length > 6 ? ", ..." : "";
    return `Tensor(shape=${formatShape(a.shape)}, data=[${head}${more}])`;
  }
}
