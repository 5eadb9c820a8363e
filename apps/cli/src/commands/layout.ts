/**
 * Command: gradlab layout
 *
 * Prints the logical contents and the raw storage of a small matrix
 * (cell (i, j) holds i*cols + j) for one layout.
 */
import { parseLayoutStrict, zeros } from "@gradlab/tensor";
import { parseKV, strArg, intArg } from "../parse.js";

export async function layoutCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const layout = parseLayoutStrict(strArg(kv, "layout", "row_major"));
  const size = intArg(kv, "size", 4);
  const rows = intArg(kv, "rows", size);
  const cols = intArg(kv, "cols", size);
  const tile = intArg(kv, "tile", 2);

  const t = zeros(rows, cols, layout.name, tile);
  for (let i = 0; i < rows; i++) {
    for (let j = 0; j < cols; j++) t.set(i, j, i * cols + j);
  }
  console.log(t.toString());
  console.log(`  logical: ${JSON.stringify(t.toList())}`);
  console.log(`  memory:  ${JSON.stringify(t.memoryView())}`);
}
