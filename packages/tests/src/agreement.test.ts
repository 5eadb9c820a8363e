import { describe, it, expect } from "vitest";
import { Var, variable, constant, demoRegistry, type UnaryFn } from "@gradlab/autograd";

const POINTS = [0.5, 1.3, 2.7];
const EPS = 1e-5;

function forwardGrad(f: UnaryFn, x: number): number {
  return f(variable(x)).grad;
}

function reverseGrad(f: UnaryFn, x: number): number {
  const v = new Var(x);
  f(v).backward();
  return v.grad;
}

function centralDiff(f: UnaryFn, x: number): number {
  return (f(constant(x + EPS)).val - f(constant(x - EPS)).val) / (2 * EPS);
}

describe("Forward and reverse mode agree", () => {
  for (const name of demoRegistry.list()) {
    const { label, f, df } = demoRegistry.get(name);

    it(`${name}: ${label}`, () => {
      for (const x of POINTS) {
        const fwd = forwardGrad(f, x);
        const rev = reverseGrad(f, x);
        expect(fwd).toBeCloseTo(df(x), 9);
        expect(rev).toBeCloseTo(fwd, 10);
        expect(fwd).toBeCloseTo(centralDiff(f, x), 5);
      }
    });
  }

  it("primal values match in both modes", () => {
    const { f } = demoRegistry.get("sin_exp");
    const v = f(new Var(1.1)).val;
    expect(f(variable(1.1)).val).toBe(v);
  });

  it("differentiation is linear", () => {
    const g: UnaryFn = (x) => x.sin();
    const h: UnaryFn = (x) => x.pow(3);
    const combo: UnaryFn = (x) => g(x).mul(2).add(h(x).mul(3));
    const x = 0.8;
    expect(forwardGrad(combo, x)).toBeCloseTo(2 * forwardGrad(g, x) + 3 * forwardGrad(h, x), 12);
    expect(reverseGrad(combo, x)).toBeCloseTo(2 * reverseGrad(g, x) + 3 * reverseGrad(h, x), 12);
  });

  it("unknown demo names are rejected", () => {
    expect(() => demoRegistry.get("nope")).toThrow(/Unknown implementation "nope"/);
  });
});
