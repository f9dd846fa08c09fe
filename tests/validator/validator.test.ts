import { describe, it, expect } from "vitest";
import { decodeModule } from "../../src/binary/decoder.js";
import { ValidationError } from "../../src/errors/errors.js";
import { Validator, validateModule } from "../../src/validator/validator.js";
import { buildModule, type FuncDef, type ModuleDef } from "../helpers/wasm.js";

function validate(def: ModuleDef) {
  return new Validator().validate(decodeModule(buildModule(def)).module);
}

function reasons(def: ModuleDef): string[] {
  return validate(def).errors.map(e => e.reason);
}

describe("Validator", () => {
  it("records the operand stack before every instruction", () => {
    const { validated, errors } = validate({
      functions: [{ params: ["i32", "i32"], results: ["i32"], body: ["local.get 0", "local.get 1", "i32.add"] }],
    });
    expect(errors).toEqual([]);
    const meta = validated?.functions[0];
    expect(meta?.locals).toEqual(["i32", "i32"]);
    expect(meta?.stack.map(s => s.types)).toEqual([[], ["i32"], ["i32", "i32"], ["i32"]]);
    expect(meta?.maxHeight).toBe(2);
  });

  it("maps blocks to their end and if to its else", () => {
    const { validated } = validate({
      functions: [{
        params: ["i32"],
        results: ["i32"],
        body: ["block i32", "local.get 0", "if i32", "i32.const 10", "else", "i32.const 20", "end", "end"],
      }],
    });
    const meta = validated?.functions[0];
    expect(meta?.blockEnd).toEqual(new Map([[2, 6], [0, 7]]));
    expect(meta?.elseAt).toEqual(new Map([[2, 4]]));
  });

  it("marks code after unreachable as unreachable", () => {
    const { validated, errors } = validate({
      functions: [{ results: ["i32"], body: ["unreachable", "i32.add"] }],
    });
    expect(errors).toEqual([]);
    expect(validated?.functions[0].stack.map(s => s.reachable)).toEqual([true, false, false]);
    expect(validated?.functions[0].stack[1].height).toBe(0);
  });

  it("reports where a type mismatch happened", () => {
    const { errors } = validate({ functions: [{ results: ["i32"], body: ["i64.const 1"] }] });
    expect(errors).toHaveLength(1);
    const [err] = errors;
    expect(err.message).toBe("type mismatch in function 0 at instruction 1");
    expect(err.funcIndex).toBe(0);
    expect(err.instrIndex).toBe(1);
  });

  it("rejects references to things that do not exist", () => {
    expect(reasons({ functions: [{ body: ["local.get 3", "drop"] }] })).toEqual(["unknown local"]);
    expect(reasons({ functions: [{ body: ["br 1"] }] })).toEqual(["unknown label"]);
    expect(reasons({ functions: [{ body: ["call 4"] }] })).toEqual(["unknown function"]);
    expect(reasons({ functions: [{ body: ["i32.const 0", "i32.load", "drop"] }] })).toEqual(["unknown memory 0"]);
  });

  it("rejects writes to an immutable global", () => {
    expect(reasons({
      globals: [{ type: "i32", init: "i32.const 0" }],
      functions: [{ body: ["i32.const 1", "global.set 0"] }],
    })).toEqual(["global is immutable"]);
  });

  it("allows ref.func only for functions referenced outside code", () => {
    const functions: FuncDef[] = [{ results: ["funcref"], body: ["ref.func 1"] }, { body: [] }];
    expect(reasons({ functions })).toEqual(["undeclared function reference"]);
    expect(reasons({ functions: [functions[0], { ...functions[1], export: "target" }] })).toEqual([]);
  });

  it("accepts an imported mutable global", () => {
    expect(reasons({
      imports: [{ module: "env", name: "counter", kind: "global", type: "i32", mutable: true }],
      functions: [{ body: ["i32.const 1", "global.set 0"] }],
    })).toEqual([]);
  });

  it("rejects over-aligned memory accesses", () => {
    expect(reasons({
      memory: { min: 1 },
      functions: [{ body: ["i32.const 0", "i32.load align=8", "drop"] }],
    })).toEqual(["alignment must not be larger than natural"]);
  });

  it("requires a data count section for memory.init", () => {
    expect(reasons({
      memory: { min: 1 },
      datas: [{ bytes: [1] }],
      functions: [{ body: ["i32.const 0", "i32.const 0", "i32.const 1", "memory.init 0"] }],
    })).toEqual(["data count section required"]);
  });

  it("checks module-level rules", () => {
    expect(reasons({
      functions: [{ export: "f", body: [] }, { export: "f", body: [] }],
    })).toEqual(["duplicate export name"]);
    expect(reasons({ functions: [{ params: ["i32"], body: [] }], start: 0 })).toEqual(["start function"]);
    expect(reasons({ memory: { min: 2, max: 1 } })).toEqual(["size minimum must not be greater than maximum"]);
    expect(reasons({ globals: [{ type: "i64", init: "i32.const 0" }] })).toEqual(["type mismatch"]);
  });

  it("collects one error per function", () => {
    expect(reasons({
      functions: [
        { body: ["i32.const 1"] },
        { body: ["nop"] },
        { body: ["local.get 0", "drop"] },
      ],
    })).toEqual(["type mismatch", "unknown local"]);
  });

  it("throws the first error from validateModule", () => {
    const { module } = decodeModule(buildModule({ functions: [{ body: ["br 2"] }] }));
    expect(() => validateModule(module)).toThrow(ValidationError);
    expect(() => validateModule(module)).toThrow("unknown label in function 0 at instruction 0");
  });
});
