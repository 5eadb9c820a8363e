/**
 * @gradlab/autograd -- forward-mode (dual numbers) and reverse-mode
 * (computation graph) automatic differentiation over scalars.
 *
 * The two modes export functions with the same names, so each lives in
 * its own namespace: `forward.sin(x)` / `reverse.sin(v)`.
 */
export { Dual, variable, constant, toDual } from "./dual.js";
export { Var, toVar, backward, zeroGrad, topoOrder, type BackwardEdge } from "./graph.js";
export { type Scalar, type UnaryFn, type NaryFn, formatScalar } from "./scalar.js";
export type { GradientResult } from "./reverse.js";
export { demoRegistry, type DemoFunction } from "./demos.js";

export * as forward from "./forward.js";
export * as reverse from "./reverse.js";
