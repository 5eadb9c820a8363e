import { describe, it, expect } from "vitest";
import { ArgumentError } from "@gradlab/core";
import { Dual, variable, constant, toDual, forward, formatScalar } from "@gradlab/autograd";

describe("Dual numbers", () => {
  it("x² + 3x at x = 2", () => {
    const x = variable(2);
    const f = x.mul(x).add(constant(3).mul(x));
    expect(f.val).toBe(10);
    expect(f.grad).toBe(7);
  });

  it("sin(x)·exp(x) at x = 0", () => {
    const x = variable(0);
    const f = x.sin().mul(x.exp());
    expect(f.val).toBe(0);
    expect(f.grad).toBe(1);
  });

  it("quotient rule", () => {
    const f = variable(6).div(2);
    expect(f.val).toBe(3);
    expect(f.grad).toBe(0.5);
  });

  it("power rule with a real exponent", () => {
    const f = variable(4).pow(0.5);
    expect(f.val).toBe(2);
    expect(f.grad).toBe(0.25);
  });

  it("sqrt matches pow(0.5)", () => {
    const f = variable(4).sqrt();
    expect(f.val).toBe(2);
    expect(f.grad).toBe(0.25);
  });

  it("cos and neg", () => {
    const f = variable(0).cos().neg();
    expect(f.val).toBe(-1);
    expect(Object.is(f.grad, 0) || Object.is(f.grad, -0)).toBe(true);
  });

  it("log at zero gives infinities instead of throwing", () => {
    const f = variable(0).log();
    expect(f.val).toBe(-Infinity);
    expect(f.grad).toBe(Infinity);
  });

  it("free functions promote numbers to constants", () => {
    const c = forward.add(1, 2);
    expect(c.equals(new Dual(3, 0))).toBe(true);

    const x = variable(3);
    const f = forward.sub(forward.mul(2, x), 1);
    expect(f.val).toBe(5);
    expect(f.grad).toBe(2);
  });

  it("derivative() seeds the input", () => {
    const d = forward.derivative((x) => forward.pow(x, 3), 2);
    expect(d.val).toBe(8);
    expect(d.grad).toBe(12);
  });

  it("constants carry no derivative", () => {
    const f = constant(5).mul(constant(2)).exp();
    expect(f.grad).toBe(0);
  });

  it("toDual rejects non-numeric operands", () => {
    expect(() => toDual("abc")).toThrow(ArgumentError);
    expect(() => toDual("abc")).toThrow('Expected Dual or number, got string "abc"');
    expect(() => toDual(null)).toThrow("Expected Dual or number, got null");
    expect(() => variable(JSON.parse('"2"'))).toThrow(ArgumentError);
  });

  it("formats like %g", () => {
    expect(new Dual(1.5, 2).toString()).toBe("Dual(val=1.5, grad=2)");
    expect(new Dual(1 / 3, 1e-7).toString()).toBe("Dual(val=0.333333, grad=1e-07)");
    expect(new Dual().toString()).toBe("Dual(val=0, grad=0)");
  });
});

describe("formatScalar", () => {
  it("uses fixed notation for exponents from -4 to 5", () => {
    expect(formatScalar(0.0001)).toBe("0.0001");
    expect(formatScalar(123456)).toBe("123456");
    expect(formatScalar(-2.5)).toBe("-2.5");
    expect(formatScalar(3.14159265)).toBe("3.14159");
  });

  it("switches to exponent form outside that range", () => {
    expect(formatScalar(1234567)).toBe("1.23457e+06");
    expect(formatScalar(1e-5)).toBe("1e-05");
    expect(formatScalar(-2.5e-7)).toBe("-2.5e-07");
    expect(formatScalar(1.5e300)).toBe("1.5e+300");
  });

  it("handles zeros and non-finite values", () => {
    expect(formatScalar(0)).toBe("0");
    expect(formatScalar(-0)).toBe("-0");
    expect(formatScalar(Infinity)).toBe("inf");
    expect(formatScalar(-Infinity)).toBe("-inf");
    expect(formatScalar(NaN)).toBe("nan");
  });

  it("renders large derivatives in exponent form", () => {
    expect(variable(100).pow(4).toString()).toBe("Dual(val=1e+08, grad=4e+06)");
  });
});
