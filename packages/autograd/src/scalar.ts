/**
 * The arithmetic surface shared by forward-mode duals and reverse-mode
 * graph nodes. A function written against Scalar<T> can be evaluated in
 * either mode.
 */
export interface Scalar<T> {
  /** Primal value. */
  readonly val: number;
  /** Derivative (dual) or accumulated gradient (graph node). */
  readonly grad: number;

  add(other: T | number): T;
  sub(other: T | number): T;
  mul(other: T | number): T;
  div(other: T | number): T;
  neg(): T;

  /** Raise to a constant real exponent. */
  pow(n: number): T;
  sin(): T;
  cos(): T;
  exp(): T;
  log(): T;
  sqrt(): T;
}

/** A scalar function of one input, generic over the differentiation mode. */
export type UnaryFn = <T extends Scalar<T>>(x: T) => T;

/** A scalar function of several inputs, generic over the differentiation mode. */
export type NaryFn = <T extends Scalar<T>>(...xs: T[]) => T;

const PRECISION = 6;

function stripZeros(digits: string): string {
  return digits.includes(".") ? digits.replace(/\.?0+$/, "") : digits;
}

/**
 * Render a float the way `%g` does: six significant digits, trailing zeros
 * dropped, exponent form when the exponent is below -4 or at least 6, with
 * a signed exponent of at least two digits (`1.23457e+06`, `1e-05`).
 */
export function formatScalar(x: number): string {
  if (Number.isNaN(x)) return "nan";
  if (!Number.isFinite(x)) return x > 0 ? "inf" : "-inf";
  if (x === 0) return Object.is(x, -0) ? "-0" : "0";

  const [mantissa, exp] = x.toExponential(PRECISION - 1).split("e");
  const e = Number(exp);
  if (e < -4 || e >= PRECISION) {
    const sign = e < 0 ? "-" : "+";
    return `${stripZeros(mantissa)}e${sign}${String(Math.abs(e)).padStart(2, "0")}`;
  }
  return stripZeros(x.toFixed(PRECISION - 1 - e));
}
