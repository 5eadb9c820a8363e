/**
 * Command: gradlab bench
 *
 * Suites:
 *   layout — row / column / raw traversal sums on each configured layout
 *   grad   — forward vs reverse mode gradient of Σ xᵢ²·sin(xᵢ)
 *   all    — both
 */
import { Effect } from "effect";
import { ArgumentError, loadBenchConfig, type BenchConfig } from "@gradlab/core";
import { runLayoutBenches, benchGradient, type BenchResult } from "@gradlab/bench";
import { LoggerLive, withSpan } from "@gradlab/effect-runtime";
import { parseKV, strArg, intArg, benchOverrides } from "../parse.js";

function printLayoutTable(results: readonly BenchResult[]): void {
  console.log(
    `${"layout".padEnd(10)} ${"traversal".padEnd(15)} ${"shape".padEnd(12)} ${"sum".padStart(16)} ${"time".padStart(12)}`,
  );
  for (const r of results) {
    console.log(
      `${r.layout.padEnd(10)} ${r.name.padEnd(15)} ${r.shape.padEnd(12)} ${r.sum.toFixed(0).padStart(16)} ${`${r.timeMs.toFixed(2)}ms`.padStart(12)}`,
    );
  }
}

const layoutSuite = (config: BenchConfig) =>
  Effect.gen(function* () {
    yield* Effect.logInfo(
      `layout suite: ${config.size}x${config.size}, tile=${config.tileSize}, iters=${config.iters}, layouts=${config.layouts.join(",")}`,
    );
    const results = yield* withSpan("bench.layout", Effect.sync(() => runLayoutBenches(config)));
    printLayoutTable(results);
  });

const gradSuite = (n: number, iters: number) =>
  Effect.gen(function* () {
    yield* Effect.logInfo(`grad suite: n=${n}, iters=${iters}`);
    const r = yield* withSpan("bench.grad", Effect.sync(() => benchGradient(n, iters)));
    console.log(`forward (${n} passes): ${r.forwardMs.toFixed(2)}ms`);
    console.log(`reverse (1 pass):      ${r.reverseMs.toFixed(2)}ms`);
    console.log(`max |Δgrad|:           ${r.maxDiff.toExponential(2)}`);
  });

export const BENCH_SUITES = ["layout", "grad", "all"] as const;
type BenchSuite = (typeof BENCH_SUITES)[number];

function isBenchSuite(name: string): name is BenchSuite {
  return (BENCH_SUITES as readonly string[]).includes(name);
}

export async function benchCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const suite = strArg(kv, "suite", "layout");
  if (!isBenchSuite(suite)) {
    throw new ArgumentError({ message: `Unknown suite "${suite}". Expected ${BENCH_SUITES.join(", ")}` });
  }
  const gradN = intArg(kv, "n", 64);

  const config = await Effect.runPromise(loadBenchConfig(kv["config"], benchOverrides(kv)));

  const program = Effect.gen(function* () {
    yield* Effect.logDebug(`config: ${JSON.stringify(config)}`);
    if (suite === "layout" || suite === "all") yield* layoutSuite(config);
    if (suite === "grad" || suite === "all") yield* gradSuite(gradN, Math.min(config.iters, 100));
  });

  await Effect.runPromise(program.pipe(Effect.provide(LoggerLive(config.logLevel))));
}
