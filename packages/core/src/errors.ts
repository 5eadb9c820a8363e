/**
 * Typed error classes shared by every package.
 *
 * Numeric code throws these synchronously (they extend Error); Effect code
 * fails with them. Floating-point domain problems are never raised: they
 * surface as NaN or Infinity in the returned values.
 */
import { Data } from "effect";

/** Bad operand type, bad dimension, out-of-range index, unknown name under strict parsing. */
export class ArgumentError extends Data.TaggedError("ArgumentError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** Incompatible tensor dimensions. */
export class ShapeError extends Data.TaggedError("ShapeError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class NotSupportedError extends Data.TaggedError("NotSupportedError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** Short human-readable description of an arbitrary value, for error messages. */
export function describeValue(v: unknown): string {
  if (v === null) return "null";
  if (Array.isArray(v)) return "array";
  if (typeof v === "object") {
    const name = v.constructor?.name;
    return name && name !== "Object" ? name : "object";
  }
  if (typeof v === "string") return `string "${v}"`;
  return typeof v;
}
