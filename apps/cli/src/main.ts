/**
 * gradlab CLI — the main entry point.
 *
 * Commands: bench, layout, grad
 *
 * Runs from sources: `npm run gradlab -- <command> [--key=value ...]`
 */
import { benchCmd } from "./commands/bench.js";
import { layoutCmd } from "./commands/layout.js";
import { gradCmd } from "./commands/grad.js";

const USAGE = `
gradlab — automatic differentiation and layout-aware tensors

Commands:
  bench            Run the layout traversal and autodiff benchmarks
  layout           Show logical vs storage order for a layout
  grad             Differentiate a demo function in forward and reverse mode

Options:
  --help, -h       Show this help

Examples:
  npm run gradlab -- bench --suite=layout --size=256 --tile=16 --iters=1000
  npm run gradlab -- bench --suite=all --config=bench.json --logLevel=debug
  npm run gradlab -- layout --layout=tiled --rows=3 --cols=5 --tile=2
  npm run gradlab -- grad --fn=sin_exp --x=1
  npm run gradlab -- grad --list
`.trim();

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    process.exit(0);
  }

  const command = args[0];

  if (command === "bench") {
    await benchCmd(args.slice(1));
  } else if (command === "layout") {
    await layoutCmd(args.slice(1));
  } else if (command === "grad") {
    await gradCmd(args.slice(1));
  } else {
    console.error(`Unknown command: ${args.join(" ")}`);
    console.log(USAGE);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
