import { describe, it, expect } from "vitest";
import { decodeModule } from "../../src/binary/decoder.js";
import { formatInstruction } from "../../src/binary/print.js";
import { DecodeError } from "../../src/errors/errors.js";
import { buildModule } from "../helpers/wasm.js";

const HEADER = [0x00, 0x61, 0x73, 0x6d, 0x01, 0x00, 0x00, 0x00];

function decodeError(bytes: number[]): DecodeError {
  try {
    decodeModule(Uint8Array.from(bytes));
  } catch (e) {
    if (e instanceof DecodeError) return e;
    throw e;
  }
  throw new Error("expected a DecodeError");
}

describe("decodeModule", () => {
  it("decodes an empty module", () => {
    const { module, warnings } = decodeModule(Uint8Array.from(HEADER));
    expect(module.types).toEqual([]);
    expect(module.functions).toEqual([]);
    expect(module.sectionOrder).toEqual([]);
    expect(warnings).toEqual([]);
  });

  it("decodes types, exports, bodies and names", () => {
    const bytes = buildModule({
      functions: [{
        name: "add",
        export: "add",
        params: ["i32", "i32"],
        results: ["i32"],
        locals: ["i64"],
        localNames: ["a", "b"],
        body: ["local.get 0", "local.get 1", "i32.add"],
      }],
    });
    const { module } = decodeModule(bytes);

    expect(module.types).toEqual([{ params: ["i32", "i32"], results: ["i32"] }]);
    expect(module.exports).toEqual([{ name: "add", kind: "func", index: 0 }]);
    expect(module.sectionOrder).toEqual([1, 3, 7, 10]);

    const [fn] = module.functions;
    expect(fn.locals).toEqual(["i64"]);
    expect(fn.body.map(formatInstruction)).toEqual(["local.get 0", "local.get 1", "i32.add", "end"]);
    expect(fn.body.map(i => bytes[i.offset])).toEqual([0x20, 0x20, 0x6a, 0x0b]);

    expect(module.names.functions.get(0)).toBe("add");
    expect(module.names.locals.get(0)).toEqual(new Map([[0, "a"], [1, "b"]]));
    expect(module.customs.map(c => c.name)).toEqual(["name"]);
  });

  it("decodes memories, globals, segments and the start function", () => {
    const bytes = buildModule({
      table: { min: 2, max: 4 },
      memory: { min: 1, max: 3 },
      globals: [{ type: "i64", mutable: true, init: "i64.const -5" }],
      functions: [{ body: ["nop"] }],
      start: 0,
      elements: [{ offset: 1, funcs: [0] }],
      datas: [{ offset: 16, bytes: [7, 8] }, { bytes: [9] }],
      dataCount: true,
    });
    const { module } = decodeModule(bytes);

    expect(module.tables).toEqual([{ elemType: "funcref", limits: { min: 2, max: 4 } }]);
    expect(module.memories).toEqual([{ limits: { min: 1, max: 3 } }]);
    expect(module.globals[0].type).toEqual({ valueType: "i64", mutable: true });
    expect(module.globals[0].init.map(formatInstruction)).toEqual(["i64.const -5"]);
    expect(module.start).toBe(0);
    expect(module.elements[0].mode.kind).toBe("active");
    expect(module.elements[0].init.map(item => item.map(formatInstruction))).toEqual([["ref.func 0"]]);
    expect(module.datas.map(d => [d.mode.kind, Array.from(d.data)])).toEqual([["active", [7, 8]], ["passive", [9]]]);
    expect(module.dataCount).toBe(2);
  });

  it("rejects a bad header", () => {
    const magic = decodeError([0x00, 0x61, 0x73, 0x6e, 0x01, 0x00, 0x00, 0x00]);
    expect(magic.reason).toBe("magic header not detected");
    expect(magic.offset).toBe(0);

    const version = decodeError([...HEADER.slice(0, 4), 0x02, 0x00, 0x00, 0x00]);
    expect(version.reason).toBe("unknown binary version");
    expect(version.offset).toBe(4);
  });

  it("enforces section order", () => {
    expect(decodeError([...HEADER, 3, 1, 0, 1, 1, 0]).reason).toBe("section out of order");
    expect(decodeError([...HEADER, 1, 1, 0, 1, 1, 0]).reason).toBe("duplicate section");
    expect(decodeError([...HEADER, 13, 0]).reason).toBe("malformed section id");
  });

  it("rejects a section whose contents do not fill its size", () => {
    expect(decodeError([...HEADER, 1, 2, 0, 0]).reason).toBe("section size mismatch");
  });

  it("rejects a function section without a matching code section", () => {
    expect(decodeError([...HEADER, 1, 4, 1, 0x60, 0, 0, 3, 2, 1, 0]).reason)
      .toBe("function and code section have inconsistent lengths");
  });

  it("points at the offending byte of an unknown opcode", () => {
    const err = decodeError([...HEADER, 1, 4, 1, 0x60, 0, 0, 3, 2, 1, 0, 10, 4, 1, 2, 0, 0xff]);
    expect(err.reason).toBe("unknown opcode 0xff");
    expect(err.offset).toBe(23);
  });

  it("rejects a body that stops before its final end", () => {
    expect(decodeError([...HEADER, 1, 4, 1, 0x60, 0, 0, 3, 2, 1, 0, 10, 4, 1, 2, 0, 0x01]).reason)
      .toBe("unexpected end of section or function");
  });

  it("skips a malformed name section with a warning", () => {
    const { module, warnings } = decodeModule(Uint8Array.from([
      ...HEADER, 0, 8, 4, 0x6e, 0x61, 0x6d, 0x65, 1, 5, 0xff,
    ]));
    expect(module.names.functions.size).toBe(0);
    expect(warnings.map(w => [w.severity, w.message])).toEqual([
      ["warning", "ignoring malformed name section: unexpected end"],
    ]);
  });
});
