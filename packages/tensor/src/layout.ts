/**
 * LayoutTensor -- a 2-D dense tensor over a pluggable memory layout.
 *
 * One contiguous Float64Array holds the cells; the (i, j) → offset function
 * is chosen at construction from a closed set of layouts. Logical semantics
 * are the same for every layout, only the storage order differs.
 *
 * The tiled layout stores T×T blocks contiguously and pads both dimensions
 * up to a multiple of T. Padding cells stay 0: no logical (i, j) reaches
 * them, but memoryView() and raw traversals see them.
 */

import {
  ArgumentError,
  ShapeError,
  Registry,
  describeValue,
  formatShape,
  isLayoutName,
  padTo,
  type LayoutName,
} from "@gradlab/core";

// ---------------------------------------------------------------------------
// Layout strategies
// ---------------------------------------------------------------------------

export interface Dims {
  readonly rows: number;
  readonly cols: number;
  readonly tileSize: number;
}

export interface Layout {
  readonly name: LayoutName;
  /** Number of storage cells, padding included. */
  storageSize(dims: Dims): number;
  offset(dims: Dims, i: number, j: number): number;
}

export const rowMajor: Layout = {
  name: "row_major",
  storageSize: ({ rows, cols }) => rows * cols,
  offset: ({ cols }, i, j) => i * cols + j,
};

export const colMajor: Layout = {
  name: "col_major",
  storageSize: ({ rows, cols }) => rows * cols,
  offset: ({ rows }, i, j) => j * rows + i,
};

export const tiled: Layout = {
  name: "tiled",
  storageSize: ({ rows, cols, tileSize }) => padTo(rows, tileSize) * padTo(cols, tileSize),
  offset: ({ cols, tileSize: t }, i, j) => {
    const tilesPerRow = Math.ceil(cols / t);
    const tileIdx = Math.floor(i / t) * tilesPerRow + Math.floor(j / t);
    return tileIdx * t * t + (i % t) * t + (j % t);
  },
};

export const layoutRegistry = new Registry<Layout>("layout");
layoutRegistry.register("row_major", () => rowMajor);
layoutRegistry.register("col_major", () => colMajor);
layoutRegistry.register("tiled", () => tiled);

/** Resolve a layout name; unknown names fall back to row-major. */
export function parseLayout(name: string): Layout {
  return layoutRegistry.getOr(name, "row_major");
}

/** Resolve a layout name, rejecting unknown names. */
export function parseLayoutStrict(name: string): Layout {
  if (!isLayoutName(name)) {
    throw new ArgumentError({
      message: `Unknown layout "${name}". Available: ${layoutRegistry.list().join(", ")}`,
    });
  }
  return layoutRegistry.get(name);
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function checkDim(label: string, n: unknown): number {
  if (typeof n !== "number" || !Number.isInteger(n) || n <= 0) {
    throw new ArgumentError({ message: `${label} must be a positive integer, got ${typeof n === "number" ? n : describeValue(n)}` });
  }
  return n;
}

// ---------------------------------------------------------------------------
// LayoutTensor
// ---------------------------------------------------------------------------

export class LayoutTensor {
  readonly rows: number;
  readonly cols: number;
  readonly layout: Layout;
  readonly tileSize: number;
  /** Storage in layout order, padding included. */
  readonly data: Float64Array;
  private readonly dims: Dims;

  constructor(rows: number, cols: number, layout: Layout = rowMajor, tileSize = 2) {
    this.rows = checkDim("rows", rows);
    this.cols = checkDim("cols", cols);
    this.tileSize = checkDim("tile_size", tileSize);
    this.layout = layout;
    this.dims = { rows, cols, tileSize };
    this.data = new Float64Array(layout.storageSize(this.dims));
  }

  get shape(): [number, number] {
    return [this.rows, this.cols];
  }

  get layoutName(): LayoutName {
    return this.layout.name;
  }

  get storageSize(): number {
    return this.data.length;
  }

  /** Storage offset of logical cell (i, j). */
  offset(i: number, j: number): number {
    if (!Number.isInteger(i) || !Number.isInteger(j) || i < 0 || j < 0 || i >= this.rows || j >= this.cols) {
      throw new ArgumentError({
        message: `Index (${i}, ${j}) out of range for shape ${formatShape(this.shape)}`,
      });
    }
    return this.layout.offset(this.dims, i, j);
  }

  get(i: number, j: number): number {
    return this.data[this.offset(i, j)];
  }

  set(i: number, j: number, value: number): void {
    this.data[this.offset(i, j)] = value;
  }

  /** Logical contents as a row-major nested list, whatever the storage order. */
  toList(): number[][] {
    const out: number[][] = new Array(this.rows);
    for (let i = 0; i < this.rows; i++) {
      const row: number[] = new Array(this.cols);
      for (let j = 0; j < this.cols; j++) row[j] = this.get(i, j);
      out[i] = row;
    }
    return out;
  }

  /** Copy of the raw storage in layout order, padding included. */
  memoryView(): number[] {
    return Array.from(this.data);
  }

  toString(): string {
    const tile = this.layout.name === "tiled" ? `, tile_size=${this.tileSize}` : "";
    return `LayoutTensor(shape=${formatShape(this.shape)}, layout=${this.layout.name}${tile})`;
  }
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

/** A rows × cols tensor of zeros. Unknown layout names fall back to row-major. */
export function zeros(rows: number, cols: number, layout = "row_major", tileSize = 2): LayoutTensor {
  return new LayoutTensor(rows, cols, parseLayout(layout), tileSize);
}

/**
 * Build a tensor from a list of rows, writing every cell through the
 * layout-aware setter. Unknown layout names fall back to row-major.
 */
export function fromList(
  rows: readonly (readonly number[])[],
  layout = "row_major",
  tileSize = 2,
): LayoutTensor {
  if (!Array.isArray(rows) || rows.length === 0) {
    throw new ArgumentError({ message: `Expected a non-empty list of rows, got ${describeValue(rows)}` });
  }
  const first: unknown = rows[0];
  if (!Array.isArray(first)) {
    throw new ArgumentError({ message: `Expected a list of rows, got a list of ${describeValue(first)}` });
  }
  const nCols = first.length;
  const t = new LayoutTensor(rows.length, nCols, parseLayout(layout), tileSize);

  for (let i = 0; i < rows.length; i++) {
    const row: unknown = rows[i];
    if (!Array.isArray(row)) {
      throw new ArgumentError({ message: `Row ${i} is ${describeValue(row)}, expected a list` });
    }
    if (row.length !== nCols) {
      throw new ShapeError({ message: `Row ${i} has ${row.length} entries, expected ${nCols}` });
    }
    for (let j = 0; j < nCols; j++) {
      const v: unknown = row[j];
      if (typeof v !== "number") {
        throw new ArgumentError({ message: `Cell (${i}, ${j}) is ${describeValue(v)}, expected a number` });
      }
      t.set(i, j, v);
    }
  }
  return t;
}
