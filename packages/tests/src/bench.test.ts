import { describe, it, expect } from "vitest";
import { ArgumentError } from "@gradlab/core";
import { variable, constant } from "@gradlab/autograd";
import { zeros } from "@gradlab/tensor";
import {
  benchmarkRowSum,
  benchmarkColSum,
  benchmarkRawSequential,
  rampTensor,
  runLayoutBenches,
  benchGradient,
  sumSquaresSin,
} from "@gradlab/bench";

describe("Layout benchmarks", () => {
  it("512×512 of ones sums to 262144 in every traversal", () => {
    const t = zeros(512, 512);
    t.data.fill(1);
    for (const bench of [benchmarkRowSum, benchmarkColSum, benchmarkRawSequential]) {
      const { sum, timeMs } = bench(t, 2);
      expect(sum).toBe(262144);
      expect(Number.isFinite(timeMs)).toBe(true);
      expect(timeMs).toBeGreaterThanOrEqual(0);
    }
  });

  it("raw sequential is not slower per element than a strided walk", () => {
    const t = zeros(512, 512);
    t.data.fill(1);
    benchmarkRawSequential(t, 2);
    benchmarkColSum(t, 2);
    const raw = benchmarkRawSequential(t, 10);
    const strided = benchmarkColSum(t, 10);
    expect(raw.timeMs / t.storageSize).toBeLessThan((strided.timeMs * 3 + 5) / (512 * 512));
  });

  it("raw traversal includes tiled padding", () => {
    const t = zeros(3, 3, "tiled", 2);
    for (let i = 0; i < 3; i++) for (let j = 0; j < 3; j++) t.set(i, j, 1);
    expect(t.storageSize).toBe(16);
    expect(benchmarkRawSequential(t, 1).sum).toBe(9);
    expect(benchmarkRowSum(t, 1).sum).toBe(9);
  });

  it("rampTensor fills i*size + j", () => {
    const t = rampTensor(3, "col_major", 2);
    expect(t.toList()).toEqual([[0, 1, 2], [3, 4, 5], [6, 7, 8]]);
  });

  it("runLayoutBenches covers every layout and traversal", () => {
    const results = runLayoutBenches({ size: 8, tileSize: 3, iters: 2, layouts: ["row_major", "tiled"] });
    expect(results.map((r) => `${r.layout}/${r.name}`)).toEqual([
      "row_major/row_sum",
      "row_major/col_sum",
      "row_major/raw_sequential",
      "tiled/row_sum",
      "tiled/col_sum",
      "tiled/raw_sequential",
    ]);
    for (const r of results) {
      expect(r.sum).toBe(2016);
      expect(r.shape).toBe("(8, 8)");
      expect(r.iters).toBe(2);
    }
  });

  it("rejects a non-positive iteration count", () => {
    expect(() => benchmarkRowSum(zeros(2, 2), 0)).toThrow(ArgumentError);
  });
});

describe("Gradient benchmark", () => {
  it("sumSquaresSin derivative in forward mode", () => {
    const f = sumSquaresSin([variable(1), constant(2)]);
    expect(f.val).toBeCloseTo(Math.sin(1) + 4 * Math.sin(2), 12);
    expect(f.grad).toBeCloseTo(2 * Math.sin(1) + Math.cos(1), 12);
  });

  it("forward and reverse gradients agree", () => {
    const r = benchGradient(8, 2);
    expect(r.n).toBe(8);
    expect(r.iters).toBe(2);
    expect(r.maxDiff).toBeLessThan(1e-12);
    expect(r.forwardMs).toBeGreaterThanOrEqual(0);
    expect(r.reverseMs).toBeGreaterThanOrEqual(0);
  });

  it("rejects bad sizes", () => {
    expect(() => benchGradient(0)).toThrow(ArgumentError);
  });
});
