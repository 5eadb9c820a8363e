/**
 * Free-function façade for forward mode. Every argument may be a Dual or a
 * plain number; numbers are promoted to constants.
 */
import { Dual, toDual, variable } from "./dual.js";

export { Dual, variable, constant, toDual } from "./dual.js";

export function add(a: Dual | number, b: Dual | number): Dual {
  return toDual(a).add(b);
}

export function sub(a: Dual | number, b: Dual | number): Dual {
  return toDual(a).sub(b);
}

export function mul(a: Dual | number, b: Dual | number): Dual {
  return toDual(a).mul(b);
}

export function div(a: Dual | number, b: Dual | number): Dual {
  return toDual(a).div(b);
}

export function neg(a: Dual | number): Dual {
  return toDual(a).neg();
}

export function pow(a: Dual | number, n: number): Dual {
  return toDual(a).pow(n);
}

export function sin(a: Dual | number): Dual {
  return toDual(a).sin();
}

export function cos(a: Dual | number): Dual {
  return toDual(a).cos();
}

export function exp(a: Dual | number): Dual {
  return toDual(a).exp();
}

export function log(a: Dual | number): Dual {
  return toDual(a).log();
}

export function sqrt(a: Dual | number): Dual {
  return toDual(a).sqrt();
}

/** Evaluate `f` at `x` with x seeded; `.val` is f(x) and `.grad` is f'(x). */
export function derivative(f: (x: Dual) => Dual, x: number): Dual {
  return f(variable(x));
}
