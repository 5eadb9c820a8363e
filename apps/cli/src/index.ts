/**
 * @gradlab/cli -- command handlers and flag helpers, importable without
 * running the entry point.
 */
export { parseKV, intArg, floatArg, strArg, benchOverrides } from "./parse.js";
export { benchCmd, BENCH_SUITES } from "./commands/bench.js";
export { layoutCmd } from "./commands/layout.js";
export { gradCmd } from "./commands/grad.js";
