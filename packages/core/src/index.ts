/**
 * @gradlab/core -- shared types, errors, registry and configuration.
 */
export {
  ArgumentError,
  ShapeError,
  NotSupportedError,
  ConfigError,
  describeValue,
} from "./errors.js";

export {
  type Shape,
  shapeSize,
  shapeEquals,
  formatShape,
  padTo,
  type NestedList,
  LAYOUT_NAMES,
  type LayoutName,
  isLayoutName,
  LOG_LEVELS,
  type LogLevelName,
  isLogLevelName,
  type BenchConfig,
  defaultBenchConfig,
} from "./types.js";

export type { TensorData, Backend } from "./interfaces.js";

export { Registry } from "./registry.js";

export { validateBenchConfig, loadBenchConfig } from "./config.js";
