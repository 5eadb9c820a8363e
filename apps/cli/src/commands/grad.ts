/**
 * Command: gradlab grad
 *
 * Differentiates a named demo function at one point in both modes.
 */
import { Effect } from "effect";
import { demoRegistry, variable, Var } from "@gradlab/autograd";
import { LoggerLive } from "@gradlab/effect-runtime";
import { parseKV, strArg, floatArg } from "../parse.js";

export async function gradCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);

  if (kv["list"] === "true") {
    for (const n of demoRegistry.list()) console.log(`${n.padEnd(12)} ${demoRegistry.get(n).label}`);
    return;
  }

  const demo = demoRegistry.get(strArg(kv, "fn", "poly"));
  const x = floatArg(kv, "x", 2);

  const program = Effect.gen(function* () {
    yield* Effect.logInfo(`f(x) = ${demo.label} at x = ${x}`);

    const dual = demo.f(variable(x));
    const input = new Var(x);
    const out = demo.f(input);
    out.backward();

    console.log(`forward: ${dual.toString()}`);
    console.log(`reverse: f = ${out.toString()}, x = ${input.toString()}`);
    console.log(`exact:   f'(x) = ${demo.df(x)}`);
  });

  await Effect.runPromise(program.pipe(Effect.provide(LoggerLive(strArg(kv, "logLevel", "info")))));
}
