/**
 * Named single-input demo functions. Each is written once against Scalar<T>
 * and runs unchanged in forward and reverse mode; `df` is the hand-derived
 * derivative used to cross-check both engines.
 */
import { Registry } from "@gradlab/core";
import type { UnaryFn } from "./scalar.js";

export interface DemoFunction {
  readonly label: string;
  readonly f: UnaryFn;
  readonly df: (x: number) => number;
}

export const demoRegistry = new Registry<DemoFunction>("demo");

demoRegistry.register("poly", () => ({
  label: "x² + 3x",
  f: (x) => x.mul(x).add(x.mul(3)),
  df: (x) => 2 * x + 3,
}));

demoRegistry.register("sin_cos", () => ({
  label: "sin(x)·cos(x)",
  f: (x) => x.sin().mul(x.cos()),
  df: (x) => Math.cos(2 * x),
}));

demoRegistry.register("sin_exp", () => ({
  label: "sin(x)·exp(x)",
  f: (x) => x.sin().mul(x.exp()),
  df: (x) => Math.exp(x) * (Math.cos(x) + Math.sin(x)),
}));

demoRegistry.register("exp_over_x", () => ({
  label: "exp(x) / x",
  f: (x) => x.exp().div(x),
  df: (x) => (Math.exp(x) * (x - 1)) / (x * x),
}));

demoRegistry.register("sqrt_norm", () => ({
  label: "√(x² + 1)",
  f: (x) => x.mul(x).add(1).sqrt(),
  df: (x) => x / Math.sqrt(x * x + 1),
}));

demoRegistry.register("log_sin", () => ({
  label: "log(sin(x) + 2)",
  f: (x) => x.sin().add(2).log(),
  df: (x) => Math.cos(x) / (Math.sin(x) + 2),
}));

demoRegistry.register("cubic", () => ({
  label: "5x³ − 2x + 7",
  f: (x) => x.pow(3).mul(5).sub(x.mul(2)).add(7),
  df: (x) => 15 * x * x - 2,
}));

demoRegistry.register("rational", () => ({
  label: "(x − 1) / (x² + 1) − x",
  f: (x) => x.sub(1).div(x.mul(x).add(1)).sub(x),
  df: (x) => (1 + 2 * x - x * x) / ((x * x + 1) * (x * x + 1)) - 1,
}));

demoRegistry.register("damped", () => ({
  label: "exp(−x)·cos(x)",
  f: (x) => x.neg().exp().mul(x.cos()),
  df: (x) => -Math.exp(-x) * (Math.cos(x) + Math.sin(x)),
}));
