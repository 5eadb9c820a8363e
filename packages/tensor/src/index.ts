/**
 * @gradlab/tensor -- layout-aware 2-D tensors and the dense reference backend.
 */

export {
  LayoutTensor,
  type Layout,
  type Dims,
  rowMajor,
  colMajor,
  tiled,
  layoutRegistry,
  parseLayout,
  parseLayoutStrict,
  zeros,
  fromList,
} from "./layout.js";

export { CpuRefBackend } from "./cpu_ref.js";

export type { Backend, TensorData, Shape, NestedList, LayoutName } from "@gradlab/core";

// ── Backend registry ──────────────────────────────────────────────────────

import { Registry } from "@gradlab/core";
import type { Backend } from "@gradlab/core";
import { CpuRefBackend } from "./cpu_ref.js";

export const backendRegistry = new Registry<Backend>("backend");
backendRegistry.register("cpu_ref", () => new CpuRefBackend());
