import { describe, it, expect } from "vitest";
import { decodeModule } from "../../src/binary/decoder.js";
import { ByteWriter, encodeModule } from "../../src/binary/encoder.js";
import { buildModule } from "../helpers/wasm.js";

describe("ByteWriter", () => {
  it("writes LEB128 in its shortest form", () => {
    expect(Array.from(new ByteWriter().u32(624485).toBytes())).toEqual([0xe5, 0x8e, 0x26]);
    expect(Array.from(new ByteWriter().s32(-1).toBytes())).toEqual([0x7f]);
    expect(Array.from(new ByteWriter().s32(64).toBytes())).toEqual([0xc0, 0x00]);
    expect(Array.from(new ByteWriter().s64(-128n).toBytes())).toEqual([0x80, 0x7f]);
  });

  it("writes float bits little-endian", () => {
    expect(Array.from(new ByteWriter().f32Bits(0x3f800000n).toBytes())).toEqual([0x00, 0x00, 0x80, 0x3f]);
  });
});

describe("encodeModule", () => {
  it("reproduces the bytes of a module it decoded", () => {
    const bytes = buildModule({
      imports: [{ module: "env", name: "log", kind: "func", params: ["f32"] }],
      table: { min: 1 },
      memory: { min: 1, max: 2, export: "memory" },
      globals: [{ type: "i32", mutable: true, init: "i32.const 100", export: "counter" }],
      functions: [
        {
          name: "main",
          export: "main",
          params: ["i32"],
          results: ["i32"],
          locals: ["i64", "f64"],
          body: [
            "f32.const 1.5",
            "call 0",
            "block i32",
            "local.get 0",
            "i32.load offset=4",
            "end",
            "global.get 0",
            "i32.add",
          ],
        },
        { body: ["i32.const 0", "i32.const 0", "i32.const 1", "memory.init 0", "data.drop 0"] },
      ],
      start: 2,
      elements: [{ offset: 0, funcs: [1] }],
      datas: [{ bytes: [1, 2, 3] }],
      dataCount: true,
    });
    expect(Array.from(encodeModule(decodeModule(bytes).module))).toEqual(Array.from(bytes));
  });

  it("writes sections in canonical order with custom sections where they were", () => {
    const bytes = buildModule({ functions: [{ name: "f", body: [] }] });
    const { module } = decodeModule(bytes);
    const again = decodeModule(encodeModule(module)).module;
    expect(again.sectionOrder).toEqual([1, 3, 10]);
    expect(again.customs.map(c => [c.name, c.after])).toEqual([["name", 10]]);
    expect(again.names.functions.get(0)).toBe("f");
  });
});
