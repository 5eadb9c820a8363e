/**
 * Free-function façade for reverse mode. Every argument may be a Var or a
 * plain number; numbers become edge-less Vars.
 */
import { ArgumentError } from "@gradlab/core";
import { Var, toVar, backward } from "./graph.js";

export { Var, toVar, backward, zeroGrad, topoOrder, type BackwardEdge } from "./graph.js";

export function add(a: Var | number, b: Var | number): Var {
  return toVar(a).add(b);
}

export function sub(a: Var | number, b: Var | number): Var {
  return toVar(a).sub(b);
}

export function mul(a: Var | number, b: Var | number): Var {
  return toVar(a).mul(b);
}

export function div(a: Var | number, b: Var | number): Var {
  return toVar(a).div(b);
}

export function neg(a: Var | number): Var {
  return toVar(a).neg();
}

export function pow(a: Var | number, n: number): Var {
  return toVar(a).pow(n);
}

export function sin(a: Var | number): Var {
  return toVar(a).sin();
}

export function cos(a: Var | number): Var {
  return toVar(a).cos();
}

export function exp(a: Var | number): Var {
  return toVar(a).exp();
}

export function log(a: Var | number): Var {
  return toVar(a).log();
}

export function sqrt(a: Var | number): Var {
  return toVar(a).sqrt();
}

export interface GradientResult {
  readonly value: number;
  /** ∂f/∂xᵢ, one per input, in input order. */
  readonly grads: number[];
}

/**
 * Value and every partial derivative of `f` at `xs`, from a single
 * backward pass over a fresh graph.
 */
export function gradient(f: (...xs: Var[]) => Var, xs: readonly number[]): GradientResult {
  if (xs.length === 0) {
    throw new ArgumentError({ message: "gradient() needs at least one input" });
  }
  const inputs = xs.map((x) => new Var(x));
  const out = f(...inputs);
  if (!(out instanceof Var)) {
    throw new ArgumentError({ message: "gradient() expects f to return a Var" });
  }
  backward(out);
  return { value: out.val, grads: inputs.map((v) => v.grad) };
}
