/**
 * Reverse-mode autograd over a dynamically built DAG.
 *
 * Every operation allocates a result Var holding the primal value and one
 * BackwardEdge per operand. An edge's `partial` closes over the primals it
 * needs and over the result node, and returns ∂result/∂parent · result.grad
 * at the moment it is called. backward() orders the reachable graph and
 * sweeps it once from the root outward.
 *
 * Edges keep their parents alive, so the root of an expression retains the
 * whole graph and dropping the root releases it.
 */
import { ArgumentError, describeValue } from "@gradlab/core";
import { formatScalar, type Scalar } from "./scalar.js";

// ── BackwardEdge ───────────────────────────────────────────────────────────
export interface BackwardEdge {
  /** The operand this edge propagates gradient into. */
  readonly parent: Var;
  /** Local partial times the owner's current grad. */
  readonly partial: () => number;
}

// ── Var ────────────────────────────────────────────────────────────────────
export class Var implements Scalar<Var> {
  readonly val: number;
  private _grad = 0;
  private _edges: readonly BackwardEdge[] = [];

  /** A leaf holding `val`. Leaves have no edges. */
  constructor(val: number) {
    if (typeof val !== "number") {
      throw new ArgumentError({ message: `Expected a number, got ${describeValue(val)}` });
    }
    this.val = val;
  }

  /**
   * An op result. `edges` receives the new node, so partials can read its
   * grad and primal; every parent already exists, which keeps the graph
   * acyclic.
   */
  private static node(val: number, edges: (out: Var) => readonly BackwardEdge[]): Var {
    const out = new Var(val);
    out._edges = edges(out);
    return out;
  }

  /** Accumulated ∂root/∂this. Written only by backward() and zeroGrad(). */
  get grad(): number {
    return this._grad;
  }

  get edges(): readonly BackwardEdge[] {
    return this._edges;
  }

  // ── Arithmetic ───────────────────────────────────────────────────────────

  add(other: Var | number): Var {
    const b = toVar(other);
    return Var.node(this.val + b.val, (out) => [
      { parent: this, partial: () => out.grad },
      { parent: b, partial: () => out.grad },
    ]);
  }

  sub(other: Var | number): Var {
    const b = toVar(other);
    return Var.node(this.val - b.val, (out) => [
      { parent: this, partial: () => out.grad },
      { parent: b, partial: () => -out.grad },
    ]);
  }

  mul(other: Var | number): Var {
    const b = toVar(other);
    return Var.node(this.val * b.val, (out) => [
      { parent: this, partial: () => out.grad * b.val },
      { parent: b, partial: () => out.grad * this.val },
    ]);
  }

  div(other: Var | number): Var {
    const b = toVar(other);
    return Var.node(this.val / b.val, (out) => [
      { parent: this, partial: () => out.grad / b.val },
      { parent: b, partial: () => out.grad * (-this.val / (b.val * b.val)) },
    ]);
  }

  neg(): Var {
    return Var.node(-this.val, (out) => [{ parent: this, partial: () => -out.grad }]);
  }

  // ── Transcendentals ──────────────────────────────────────────────────────

  pow(n: number): Var {
    return Var.node(Math.pow(this.val, n), (out) => [
      { parent: this, partial: () => out.grad * n * Math.pow(this.val, n - 1) },
    ]);
  }

  sin(): Var {
    return Var.node(Math.sin(this.val), (out) => [
      { parent: this, partial: () => out.grad * Math.cos(this.val) },
    ]);
  }

  cos(): Var {
    return Var.node(Math.cos(this.val), (out) => [
      { parent: this, partial: () => out.grad * -Math.sin(this.val) },
    ]);
  }

  exp(): Var {
    // exp(x) is its own derivative: reuse the result's primal
    return Var.node(Math.exp(this.val), (out) => [
      { parent: this, partial: () => out.grad * out.val },
    ]);
  }

  log(): Var {
    return Var.node(Math.log(this.val), (out) => [
      { parent: this, partial: () => out.grad / this.val },
    ]);
  }

  sqrt(): Var {
    return Var.node(Math.sqrt(this.val), (out) => [
      { parent: this, partial: () => out.grad / (2 * out.val) },
    ]);
  }

  // ── Graph ────────────────────────────────────────────────────────────────

  /**
   * Seed this node with grad 1 and propagate into every reachable node.
   * Not idempotent: each call adds one more gradient to every grad.
   */
  backward(): void {
    const order = topoOrder(this);
    const prior = order.map((node) => node._grad);
    for (const node of order) node._grad = 0;

    this._grad = 1;
    for (let i = order.length - 1; i >= 0; i--) {
      for (const edge of order[i]._edges) {
        edge.parent._grad += edge.partial();
      }
    }

    for (let i = 0; i < order.length; i++) order[i]._grad += prior[i];
  }

  /** Reset grad to 0 on every node reachable from this one. */
  zeroGrad(): void {
    for (const node of topoOrder(this)) node._grad = 0;
  }

  toString(): string {
    return `Var(val=${formatScalar(this.val)}, grad=${formatScalar(this.grad)})`;
  }
}

/** Promote a plain number to an edge-less Var; pass Vars through; reject anything else. */
export function toVar(x: unknown): Var {
  if (x instanceof Var) return x;
  if (typeof x === "number") return new Var(x);
  throw new ArgumentError({ message: `Expected Var or number, got ${describeValue(x)}` });
}

// ── Traversal ──────────────────────────────────────────────────────────────

/**
 * Nodes reachable from `root`, each placed after all of its parents (inputs
 * first, root last). Iterative DFS post-order, so deep chains do not
 * exhaust the call stack.
 */
export function topoOrder(root: Var): Var[] {
  const order: Var[] = [];
  const visited = new Set<Var>([root]);
  const stack: { node: Var; next: number }[] = [{ node: root, next: 0 }];

  while (stack.length > 0) {
    const top = stack[stack.length - 1];
    const edges = top.node.edges;
    if (top.next < edges.length) {
      const parent = edges[top.next++].parent;
      if (!visited.has(parent)) {
        visited.add(parent);
        stack.push({ node: parent, next: 0 });
      }
    } else {
      stack.pop();
      order.push(top.node);
    }
  }
  return order;
}

/**
 * One backward sweep from `root`.
 *
 * The sweep runs against zeroed grads so that every edge reads only this
 * pass's gradient; grads held before the call are added back afterwards.
 * Two calls therefore leave exactly twice the gradient of one.
 */
export function backward(root: Var): void {
  root.backward();
}

export function zeroGrad(root: Var): void {
  root.zeroGrad();
}
