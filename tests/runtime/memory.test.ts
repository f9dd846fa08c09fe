import { describe, it, expect } from "vitest";
import { decodeModule } from "../../src/binary/decoder.js";
import { Trap } from "../../src/errors/errors.js";
import { invokeFunction } from "../../src/interpreter/machine.js";
import type { Instance } from "../../src/runtime/instance.js";
import { Linker } from "../../src/runtime/linker.js";
import { MemoryInstance, PAGE_SIZE } from "../../src/runtime/memory.js";
import { i32, i64, type Value } from "../../src/runtime/values.js";
import { validateModule } from "../../src/validator/validator.js";
import { buildModule, type ModuleDef } from "../helpers/wasm.js";

function instantiate(def: ModuleDef): Instance {
  return new Linker().instantiate(validateModule(decodeModule(buildModule(def)).module)).instance;
}

function call(instance: Instance, name: string): Value[] {
  const fn = instance.exportedFunction(name);
  if (!fn) throw new Error(`no export ${name}`);
  return invokeFunction(fn, []);
}

describe("MemoryInstance", () => {
  it("reads and writes little-endian integers", () => {
    const memory = new MemoryInstance({ limits: { min: 1 } });
    memory.storeI32(0, 4, 4, 0x01020304);
    expect(Array.from(memory.read(4, 4))).toEqual([4, 3, 2, 1]);
    expect(memory.loadI32(2, 2, 2, false)).toBe(0x0304);
    memory.storeI64(16, 0, 8, -2n);
    expect(memory.loadI64(16, 0, 8, true)).toBe(-2n);
    expect(memory.loadI64(16, 0, 4, false)).toBe(0xfffffffen);
  });

  it("traps on an access that crosses the end", () => {
    const memory = new MemoryInstance({ limits: { min: 1 } });
    expect(() => memory.loadI32(PAGE_SIZE - 2, 0, 4, true)).toThrow(Trap);
    expect(() => memory.storeI64(0, PAGE_SIZE, 1, 0n)).toThrow("out of bounds memory access");
    expect(memory.loadI32(PAGE_SIZE - 4, 0, 4, true)).toBe(0);
  });

  it("grows up to its maximum and the engine page limit", () => {
    const memory = new MemoryInstance({ limits: { min: 1, max: 4 } }, 3);
    expect(memory.grow(1)).toBe(1);
    expect(memory.grow(2)).toBe(-1);
    expect(memory.grow(1)).toBe(2);
    expect(memory.pages).toBe(3);
    expect(memory.byteLength).toBe(3 * PAGE_SIZE);
  });
});

describe("float loads and stores", () => {
  const SIGNALING_NAN_32 = 2141192192; // 0x7fa00000
  const SIGNALING_NAN_64 = 9219994337134247937n; // 0x7ff4000000000001

  const instance = instantiate({
    memory: { min: 1 },
    functions: [
      {
        export: "copy32",
        results: ["i32"],
        body: [
          "i32.const 0", `i32.const ${SIGNALING_NAN_32}`, "i32.store",
          "i32.const 8", "i32.const 0", "f32.load", "f32.store",
          "i32.const 8", "i32.load",
        ],
      },
      {
        export: "copy64",
        results: ["i64"],
        body: [
          "i32.const 16", `i64.const ${SIGNALING_NAN_64}`, "i64.store",
          "i32.const 32", "i32.const 16", "f64.load", "f64.store",
          "i32.const 32", "i64.load",
        ],
      },
      {
        export: "stored_bytes",
        body: ["i32.const 48", `i32.const ${SIGNALING_NAN_32}`, "f32.reinterpret_i32", "f32.store"],
      },
    ],
  });

  it("copies a signaling NaN through f32.load and f32.store", () => {
    expect(call(instance, "copy32")).toEqual([i32(SIGNALING_NAN_32)]);
  });

  it("copies a signaling NaN through f64.load and f64.store", () => {
    expect(call(instance, "copy64")).toEqual([i64(SIGNALING_NAN_64)]);
  });

  it("stores the exact bit pattern of a reinterpreted value", () => {
    call(instance, "stored_bytes");
    expect(Array.from(instance.memories[0].read(48, 4))).toEqual([0x00, 0x00, 0xa0, 0x7f]);
  });
});
