import { blockSignature, funcTypesEqual, type Instruction, type MemoryOp } from "../binary/module.js";
import { Trap } from "../errors/errors.js";
import type { FunctionInstance, Instance } from "../runtime/instance.js";
import type { MemoryInstance } from "../runtime/memory.js";
import { NUMERIC_IMPLS } from "../runtime/numeric.js";
import {
  asI32, asI64, externref, f32BitsOf, f32OfBits, f64BitsOf, f64OfBits, funcref, i32, i64, isNullRef,
  type Value,
} from "../runtime/values.js";
import type { CallFrame, Label, ValueStack } from "./frame.js";

/**
 * Result of executing one instruction.
 *
 * - `continue` / `branch`: the instruction completed and `frame.pc` points at the next one.
 * - `call`: the driver must push a frame for `callee`, whose arguments are on
 *   top of the stack, and advance `frame.pc` once the callee has returned.
 * - `return`: the frame finished; its results are on top of the stack.
 * - `trap`: `frame.pc` still points at the faulting instruction.
 */
export type StepOutcome =
  | { kind: "continue" }
  | { kind: "branch"; depth: number }
  | { kind: "call"; callee: FunctionInstance }
  | { kind: "return" }
  | { kind: "trap"; trap: Trap };

const CONTINUE: StepOutcome = { kind: "continue" };
const RETURN: StepOutcome = { kind: "return" };

/**
 * Execute the instruction at `frame.pc`.
 *
 * Operands popped before a trap are not cleared from the stack's backing
 * store, so the driver restores the pre-instruction state by resetting
 * `stack.sp`.
 */
export function step(instance: Instance, frame: CallFrame, stack: ValueStack): StepOutcome {
  const instr = frame.func.body.body[frame.pc];
  if (instr === undefined) return RETURN;
  try {
    return execute(instance, frame, stack, instr);
  } catch (e) {
    if (e instanceof Trap) return { kind: "trap", trap: e };
    throw e;
  }
}

function execute(instance: Instance, frame: CallFrame, stack: ValueStack, instr: Instruction): StepOutcome {
  switch (instr.kind) {
    // ------------------------------------------------------------
    // Control
    // ------------------------------------------------------------
    case "control":
      switch (instr.op) {
        case "unreachable":
          throw new Trap("Unreachable");
        case "nop":
          frame.pc++;
          return CONTINUE;
        case "else": {
          // Reached at the end of the `then` arm: skip the `else` arm.
          const label = frame.labels[frame.labels.length - 1];
          frame.pc = label.end;
          return CONTINUE;
        }
        case "end":
          if (frame.labels.length === 0) return RETURN;
          frame.labels.pop();
          frame.pc++;
          return CONTINUE;
        case "return":
          return RETURN;
      }
      break;

    case "block": {
      const meta = frame.func.meta;
      const sig = blockSignature(instance.module, instr.blockType);
      const end = meta.blockEnd.get(frame.pc);
      if (!sig || end === undefined) throw new Error(`unvalidated block at ${frame.pc}`);
      if (instr.op === "if") {
        const cond = asI32(stack.pop());
        if (cond === 0) {
          const elseAt = meta.elseAt.get(frame.pc);
          if (elseAt === undefined) {
            frame.pc = end + 1;
            return CONTINUE;
          }
          pushLabel(frame, stack, "if", sig.params.length, sig.results.length, end);
          frame.pc = elseAt + 1;
          return CONTINUE;
        }
      }
      const arity = instr.op === "loop" ? sig.params.length : sig.results.length;
      pushLabel(frame, stack, instr.op, sig.params.length, arity, end);
      frame.pc++;
      return CONTINUE;
    }

    case "br":
      if (instr.op === "br_if" && asI32(stack.pop()) === 0) {
        frame.pc++;
        return CONTINUE;
      }
      return branch(frame, stack, instr.depth);

    case "br_table": {
      const index = asI32(stack.pop()) >>> 0;
      const depth = index < instr.depths.length ? instr.depths[index] : instr.defaultDepth;
      return branch(frame, stack, depth);
    }

    case "call":
      return { kind: "call", callee: instance.functions[instr.funcIndex] };

    case "call_indirect": {
      const table = instance.tables[instr.tableIndex];
      const index = asI32(stack.pop()) >>> 0;
      if (index >= table.size) throw new Trap("UndefinedElement");
      const ref = table.get(index);
      if (ref.type !== "funcref" || ref.value === null) throw new Trap("UninitializedElement");
      const expected = instance.module.types[instr.typeIndex];
      if (!funcTypesEqual(ref.value.type, expected)) throw new Trap("IndirectCallTypeMismatch");
      return { kind: "call", callee: ref.value };
    }

    // ------------------------------------------------------------
    // Parametric and variables
    // ------------------------------------------------------------
    case "parametric":
      if (instr.op === "drop") {
        stack.pop();
      } else {
        const cond = asI32(stack.pop());
        const b = stack.pop();
        const a = stack.pop();
        stack.push(cond !== 0 ? a : b);
      }
      frame.pc++;
      return CONTINUE;

    case "variable":
      switch (instr.op) {
        case "local.get": stack.push(frame.locals[instr.index]); break;
        case "local.set": frame.locals[instr.index] = stack.pop(); break;
        case "local.tee": {
          const v = stack.pop();
          frame.locals[instr.index] = v;
          stack.push(v);
          break;
        }
        case "global.get": stack.push(instance.globals[instr.index].value); break;
        case "global.set": instance.globals[instr.index].value = stack.pop(); break;
      }
      frame.pc++;
      return CONTINUE;

    // ------------------------------------------------------------
    // Tables
    // ------------------------------------------------------------
    case "table": {
      const table = instance.tables[instr.tableIndex];
      switch (instr.op) {
        case "table.get":
          stack.push(table.get(asI32(stack.pop())));
          break;
        case "table.set": {
          const value = stack.pop();
          table.set(asI32(stack.pop()), value);
          break;
        }
        case "table.size":
          stack.push(i32(table.size));
          break;
        case "table.grow": {
          const delta = asI32(stack.pop()) >>> 0;
          const init = stack.pop();
          stack.push(i32(table.grow(delta, init)));
          break;
        }
        case "table.fill": {
          const n = asI32(stack.pop()) >>> 0;
          const value = stack.pop();
          const start = asI32(stack.pop()) >>> 0;
          table.fill(start, value, n);
          break;
        }
      }
      frame.pc++;
      return CONTINUE;
    }

    case "table_copy": {
      const [d, s, n] = popU32s(stack, 3);
      instance.tables[instr.dstTable].copyFrom(instance.tables[instr.srcTable], d, s, n);
      frame.pc++;
      return CONTINUE;
    }

    case "table_init": {
      const [d, s, n] = popU32s(stack, 3);
      instance.tables[instr.tableIndex].initFrom(instance.elements[instr.elemIndex], d, s, n);
      frame.pc++;
      return CONTINUE;
    }

    case "elem_drop":
      instance.dropElement(instr.elemIndex);
      frame.pc++;
      return CONTINUE;

    // ------------------------------------------------------------
    // Memory
    // ------------------------------------------------------------
    case "memory":
      memoryAccess(instance.memories[0], instr.op, instr.memArg.offset, stack);
      frame.pc++;
      return CONTINUE;

    case "memory_size": {
      const memory = instance.memories[instr.memIndex];
      if (instr.op === "memory.size") {
        stack.push(i32(memory.pages));
      } else {
        const delta = asI32(stack.pop()) >>> 0;
        stack.push(i32(memory.grow(delta)));
      }
      frame.pc++;
      return CONTINUE;
    }

    case "memory_init": {
      const [d, s, n] = popU32s(stack, 3);
      const data = instance.datas[instr.dataIndex];
      const memory = instance.memories[instr.memIndex];
      if (s + n > data.length) throw new Trap("OutOfBoundsMemoryAccess");
      memory.write(d, data.subarray(s, s + n));
      frame.pc++;
      return CONTINUE;
    }

    case "data_drop":
      instance.dropData(instr.dataIndex);
      frame.pc++;
      return CONTINUE;

    case "memory_copy": {
      const [d, s, n] = popU32s(stack, 3);
      instance.memories[instr.dstMem].copyWithin(d, s, n);
      frame.pc++;
      return CONTINUE;
    }

    case "memory_fill": {
      const n = asI32(stack.pop()) >>> 0;
      const value = asI32(stack.pop());
      const d = asI32(stack.pop()) >>> 0;
      instance.memories[instr.memIndex].fill(d, value, n);
      frame.pc++;
      return CONTINUE;
    }

    // ------------------------------------------------------------
    // Constants, numerics and references
    // ------------------------------------------------------------
    case "const":
      switch (instr.type) {
        case "i32": stack.push(i32(instr.value)); break;
        case "i64": stack.push(i64(instr.value)); break;
        case "f32": stack.push(f32OfBits(Number(instr.bits))); break;
        case "f64": stack.push(f64OfBits(instr.bits)); break;
      }
      frame.pc++;
      return CONTINUE;

    case "numeric": {
      const op = NUMERIC_IMPLS[instr.op];
      if (op.arity === 1) {
        stack.push(op.apply(stack.pop()));
      } else {
        const b = stack.pop();
        const a = stack.pop();
        stack.push(op.apply(a, b));
      }
      frame.pc++;
      return CONTINUE;
    }

    case "ref_null":
      stack.push(instr.type === "funcref" ? funcref(null) : externref(null));
      frame.pc++;
      return CONTINUE;

    case "ref_is_null":
      stack.push(i32(isNullRef(stack.pop()) ? 1 : 0));
      frame.pc++;
      return CONTINUE;

    case "ref_func":
      stack.push(funcref(instance.functions[instr.funcIndex]));
      frame.pc++;
      return CONTINUE;
  }
  throw new Error(`unhandled instruction at ${frame.pc}`);
}

function pushLabel(
  frame: CallFrame,
  stack: ValueStack,
  kind: Label["kind"],
  params: number,
  arity: number,
  end: number,
): void {
  frame.labels.push({ kind, arity, height: stack.sp - params, start: frame.pc, end });
}

/**
 * Branch to the label `depth` scopes out. Depth equal to the number of open
 * scopes addresses the function body itself and returns.
 */
function branch(frame: CallFrame, stack: ValueStack, depth: number): StepOutcome {
  if (depth === frame.labels.length) return RETURN;
  const label = frame.labels[frame.labels.length - 1 - depth];
  const carried = stack.popN(label.arity);
  stack.sp = label.height;
  stack.pushAll(carried);
  frame.labels.length -= depth + 1;
  // A loop is re-entered through its `loop` instruction, which pushes the label again.
  frame.pc = label.kind === "loop" ? label.start : label.end + 1;
  return { kind: "branch", depth };
}

/** Pop `n` i32 operands as unsigned numbers, returned bottom-first. */
function popU32s(stack: ValueStack, n: number): number[] {
  return stack.popN(n).map(v => asI32(v) >>> 0);
}

/** Store operands, popped as `[address, value]`. */
function popStore(stack: ValueStack): [number, Value] {
  const value = stack.pop();
  return [asI32(stack.pop()), value];
}

// Float loads and stores move the raw bit pattern, so NaN payloads are kept.
function memoryAccess(memory: MemoryInstance, op: MemoryOp, offset: number, stack: ValueStack): void {
  switch (op) {
    case "i32.load": stack.push(i32(memory.loadI32(asI32(stack.pop()), offset, 4, true))); return;
    case "i32.load8_s": stack.push(i32(memory.loadI32(asI32(stack.pop()), offset, 1, true))); return;
    case "i32.load8_u": stack.push(i32(memory.loadI32(asI32(stack.pop()), offset, 1, false))); return;
    case "i32.load16_s": stack.push(i32(memory.loadI32(asI32(stack.pop()), offset, 2, true))); return;
    case "i32.load16_u": stack.push(i32(memory.loadI32(asI32(stack.pop()), offset, 2, false))); return;
    case "i64.load": stack.push(i64(memory.loadI64(asI32(stack.pop()), offset, 8, true))); return;
    case "i64.load8_s": stack.push(i64(memory.loadI64(asI32(stack.pop()), offset, 1, true))); return;
    case "i64.load8_u": stack.push(i64(memory.loadI64(asI32(stack.pop()), offset, 1, false))); return;
    case "i64.load16_s": stack.push(i64(memory.loadI64(asI32(stack.pop()), offset, 2, true))); return;
    case "i64.load16_u": stack.push(i64(memory.loadI64(asI32(stack.pop()), offset, 2, false))); return;
    case "i64.load32_s": stack.push(i64(memory.loadI64(asI32(stack.pop()), offset, 4, true))); return;
    case "i64.load32_u": stack.push(i64(memory.loadI64(asI32(stack.pop()), offset, 4, false))); return;
    case "f32.load": stack.push(f32OfBits(memory.loadI32(asI32(stack.pop()), offset, 4, false))); return;
    case "f64.load": stack.push(f64OfBits(memory.loadI64(asI32(stack.pop()), offset, 8, false))); return;
    case "i32.store": {
      const [address, value] = popStore(stack);
      memory.storeI32(address, offset, 4, asI32(value));
      return;
    }
    case "i32.store8": {
      const [address, value] = popStore(stack);
      memory.storeI32(address, offset, 1, asI32(value));
      return;
    }
    case "i32.store16": {
      const [address, value] = popStore(stack);
      memory.storeI32(address, offset, 2, asI32(value));
      return;
    }
    case "i64.store": {
      const [address, value] = popStore(stack);
      memory.storeI64(address, offset, 8, asI64(value));
      return;
    }
    case "i64.store8": {
      const [address, value] = popStore(stack);
      memory.storeI64(address, offset, 1, asI64(value));
      return;
    }
    case "i64.store16": {
      const [address, value] = popStore(stack);
      memory.storeI64(address, offset, 2, asI64(value));
      return;
    }
    case "i64.store32": {
      const [address, value] = popStore(stack);
      memory.storeI64(address, offset, 4, asI64(value));
      return;
    }
    case "f32.store": {
      const [address, value] = popStore(stack);
      memory.storeI32(address, offset, 4, f32BitsOf(value));
      return;
    }
    case "f64.store": {
      const [address, value] = popStore(stack);
      memory.storeI64(address, offset, 8, f64BitsOf(value));
      return;
    }
    default: {
      const unhandled: never = op;
      throw new Error(`unknown memory instruction ${String(unhandled)}`);
    }
  }
}
