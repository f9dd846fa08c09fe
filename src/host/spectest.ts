import { HostTrap } from "../errors/errors.js";
import { GlobalInstance } from "../runtime/global.js";
import type { HostValue } from "../runtime/linker.js";
import { MemoryInstance } from "../runtime/memory.js";
import { TableInstance } from "../runtime/table.js";
import { asI32, f32, f64, formatValue, i32, i64 } from "../runtime/values.js";
import { hostFunction } from "./bridge.js";

export type PrintSink = (line: string) => void;

/**
 * The `spectest` host module the WebAssembly reference tests import from.
 * Print functions write one line per call to `sink`.
 */
export function createSpectest(sink: PrintSink): Record<string, HostValue> {
  const printer = (signature: string) =>
    hostFunction(signature, args => {
      sink(args.map(formatValue).join(" "));
      return [];
    });
  return {
    print: printer(" -> "),
    print_i32: printer("i32 -> "),
    print_i64: printer("i64 -> "),
    print_f32: printer("f32 -> "),
    print_f64: printer("f64 -> "),
    print_i32_f32: printer("i32 f32 -> "),
    print_f64_f64: printer("f64 f64 -> "),
    global_i32: new GlobalInstance({ valueType: "i32", mutable: false }, i32(666)),
    global_i64: new GlobalInstance({ valueType: "i64", mutable: false }, i64(666n)),
    global_f32: new GlobalInstance({ valueType: "f32", mutable: false }, f32(666.6)),
    global_f64: new GlobalInstance({ valueType: "f64", mutable: false }, f64(666.6)),
    table: new TableInstance({ elemType: "funcref", limits: { min: 10, max: 20 } }),
    memory: new MemoryInstance({ limits: { min: 1, max: 2 } }),
  };
}

/**
 * A minimal process module: `exit(code)` stops the program with a HostTrap
 * carrying the exit code.
 */
export function createProcessModule(): Record<string, HostValue> {
  return {
    exit: hostFunction("i32 -> ", ([code], context) => {
      const exitCode = code === undefined ? 0 : asI32(code);
      throw new HostTrap(`program exited with code ${exitCode}`, exitCode, context.callee);
    }),
  };
}
