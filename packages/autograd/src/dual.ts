/**
 * Forward-mode AD: dual numbers.
 *
 * A Dual (v, d) says "this subexpression equals v, and its derivative with
 * respect to the one seeded input equals d". Every operation applies the
 * chain rule locally, so no graph is kept: the derivative is carried
 * forward alongside the value.
 */
import { ArgumentError, describeValue } from "@gradlab/core";
import { formatScalar, type Scalar } from "./scalar.js";

export class Dual implements Scalar<Dual> {
  readonly val: number;
  readonly grad: number;

  constructor(val = 0, grad = 0) {
    this.val = val;
    this.grad = grad;
  }

  // ── Arithmetic ───────────────────────────────────────────────────────────

  add(other: Dual | number): Dual {
    const b = toDual(other);
    return new Dual(this.val + b.val, this.grad + b.grad);
  }

  sub(other: Dual | number): Dual {
    const b = toDual(other);
    return new Dual(this.val - b.val, this.grad - b.grad);
  }

  /** Product rule: (u, u')·(v, v') = (uv, u'v + uv'). */
  mul(other: Dual | number): Dual {
    const b = toDual(other);
    return new Dual(this.val * b.val, this.grad * b.val + this.val * b.grad);
  }

  /** Quotient rule: (u/v, (u'v − uv') / v²). */
  div(other: Dual | number): Dual {
    const b = toDual(other);
    const denom = b.val * b.val;
    return new Dual(this.val / b.val, (this.grad * b.val - this.val * b.grad) / denom);
  }

  neg(): Dual {
    return new Dual(-this.val, -this.grad);
  }

  // ── Transcendentals ──────────────────────────────────────────────────────

  pow(n: number): Dual {
    return new Dual(Math.pow(this.val, n), n * Math.pow(this.val, n - 1) * this.grad);
  }

  sin(): Dual {
    return new Dual(Math.sin(this.val), Math.cos(this.val) * this.grad);
  }

  cos(): Dual {
    return new Dual(Math.cos(this.val), -Math.sin(this.val) * this.grad);
  }

  exp(): Dual {
    const e = Math.exp(this.val);
    return new Dual(e, e * this.grad);
  }

  log(): Dual {
    return new Dual(Math.log(this.val), this.grad / this.val);
  }

  sqrt(): Dual {
    const s = Math.sqrt(this.val);
    return new Dual(s, this.grad / (2 * s));
  }

  // ── Misc ─────────────────────────────────────────────────────────────────

  equals(other: Dual): boolean {
    return Object.is(this.val, other.val) && Object.is(this.grad, other.grad);
  }

  toString(): string {
    return `Dual(val=${formatScalar(this.val)}, grad=${formatScalar(this.grad)})`;
  }
}

/** The designated input: derivative seeded with 1. */
export function variable(x: number): Dual {
  return new Dual(checkNumber(x), 1);
}

/** A literal: derivative 0. */
export function constant(x: number): Dual {
  return new Dual(checkNumber(x), 0);
}

/** Promote a plain number to a constant; pass duals through; reject anything else. */
export function toDual(x: unknown): Dual {
  if (x instanceof Dual) return x;
  if (typeof x === "number") return new Dual(x, 0);
  throw new ArgumentError({ message: `Expected Dual or number, got ${describeValue(x)}` });
}

function checkNumber(x: unknown): number {
  if (typeof x !== "number") {
    throw new ArgumentError({ message: `Expected a number, got ${describeValue(x)}` });
  }
  return x;
}
