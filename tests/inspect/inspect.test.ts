import { describe, it, expect } from "vitest";
import { decodeModule } from "../../src/binary/decoder.js";
import { formatSummary, summarizeModule } from "../../src/inspect.js";
import { buildModule } from "../helpers/wasm.js";

const { module } = decodeModule(buildModule({
  imports: [{ module: "env", name: "log", kind: "func", params: ["f32"] }],
  memory: { min: 1, max: 2 },
  globals: [{ type: "i32", mutable: true, init: "i32.const 0" }],
  functions: [{
    name: "add",
    export: "add",
    params: ["i32", "i32"],
    results: ["i32"],
    locals: ["i64"],
    body: ["local.get 0", "local.get 1", "i32.add"],
  }],
}));

describe("summarizeModule", () => {
  it("lists imported functions before defined ones", () => {
    const summary = summarizeModule(module);
    expect(summary.types).toEqual(["[f32] -> []", "[i32 i32] -> [i32]"]);
    expect(summary.functions).toEqual([
      { index: 0, name: "env.log", type: "[f32] -> []", imported: "env.log" },
      { index: 1, name: "$add", type: "[i32 i32] -> [i32]", locals: 1, instructions: 4 },
    ]);
    expect(summary.memories).toEqual(["pages 1..2"]);
    expect(summary.globals).toEqual(["mut i32"]);
    expect(summary.exports).toEqual([{ name: "add", kind: "func", index: 1 }]);
    expect(summary.start).toBeUndefined();
  });
});

describe("formatSummary", () => {
  it("prints non-empty sections with their counts", () => {
    expect(formatSummary(summarizeModule(module))).toEqual([
      "types (2):",
      "  0: [f32] -> []",
      "  1: [i32 i32] -> [i32]",
      "imports (1):",
      "  env.log (func)",
      "functions (2):",
      "  0: env.log [f32] -> [] imported from env.log",
      "  1: $add [i32 i32] -> [i32], 1 locals, 4 instructions",
      "memories (1):",
      "  pages 1..2",
      "globals (1):",
      "  0: mut i32",
      "exports (1):",
      "  add -> func 1",
      "custom sections (1):",
      "  name",
    ]);
  });
});
