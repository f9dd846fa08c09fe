// Host-Call Bridge: how imported functions implemented by the embedder are
// invoked from inside the interpreter.
//
// Host functions are synchronous. They receive the arguments as tagged values
// and return the results the same way; a function that wants the program to
// stop throws HostTrap. Anything else they throw is wrapped in a HostTrap so
// that a misbehaving host never looks like a VM fault.

import type { FuncType } from "../binary/module.js";
import { parseSignature } from "../binary/opcodes.js";
import { HostTrap, Trap } from "../errors/errors.js";
import type { MemoryInstance } from "../runtime/memory.js";
import type { Value } from "../runtime/values.js";

export interface HostContext {
  /** Memory `index` of the calling instance, if it has one. */
  memory(index?: number): MemoryInstance | undefined;
  /** Name of the function being called, as `module.field`. */
  readonly callee: string;
}

export interface HostFunction {
  readonly type: FuncType;
  invoke(args: Value[], context: HostContext): Value[];
}

export type HostCallResult =
  | { ok: true; results: Value[] }
  | { ok: false; error: Trap | HostTrap };

/**
 * Build a host function from a signature such as `"i32 i32 -> i32"`.
 *
 * @example
 * const add = hostFunction("i32 i32 -> i32", ([a, b]) => [i32(asI32(a) + asI32(b))]);
 */
export function hostFunction(
  signature: FuncType | string,
  invoke: (args: Value[], context: HostContext) => Value[],
): HostFunction {
  const type = typeof signature === "string" ? parseSignature(signature) : signature;
  return { type, invoke };
}

export function isHostFunction(value: unknown): value is HostFunction {
  return typeof value === "object"
    && value !== null
    && "type" in value
    && "invoke" in value
    && typeof value.invoke === "function";
}

/** Call a host function, checking the results against its declared type. */
export function callHost(fn: HostFunction, args: Value[], context: HostContext): HostCallResult {
  let results: Value[];
  try {
    results = fn.invoke(args, context);
  } catch (e) {
    if (e instanceof HostTrap || e instanceof Trap) return { ok: false, error: e };
    const message = e instanceof Error ? e.message : String(e);
    return { ok: false, error: new HostTrap(`host function ${context.callee} failed: ${message}`, undefined, context.callee) };
  }
  const expected = fn.type.results;
  if (results.length !== expected.length || results.some((r, i) => r.type !== expected[i])) {
    const got = results.map(r => r.type).join(" ");
    return {
      ok: false,
      error: new Trap("HostResultMismatch", `${context.callee} returned [${got}], expected [${expected.join(" ")}]`),
    };
  }
  return { ok: true, results };
}
