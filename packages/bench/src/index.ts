/**
 * @gradlab/bench -- traversal and autodiff micro-benchmarks.
 */
export {
  type SumTiming,
  type BenchResult,
  benchmarkRowSum,
  benchmarkColSum,
  benchmarkRawSequential,
  rampTensor,
  runLayoutBenches,
} from "./layout.js";

export { type GradBenchResult, sumSquaresSin, benchGradient } from "./autodiff.js";
