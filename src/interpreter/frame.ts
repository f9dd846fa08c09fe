import { Trap } from "../errors/errors.js";
import type { FunctionInstance } from "../runtime/instance.js";
import { defaultValue, type Value } from "../runtime/values.js";

export type WasmFunction = Extract<FunctionInstance, { kind: "wasm" }>;

/** An active `block`, `loop` or `if` scope of a frame. */
export interface Label {
  kind: "block" | "loop" | "if";
  /** Values carried by a branch to this label. */
  arity: number;
  /** Operand stack height (absolute) below the scope's parameters. */
  height: number;
  /** Index of the opening instruction. */
  start: number;
  /** Index of the matching `end`. */
  end: number;
}

/**
 * The operand stack shared by all frames. Popping only moves the stack
 * pointer, so an instruction that traps after popping can be undone by
 * resetting `sp` to its value before the instruction.
 */
export class ValueStack {
  private items: Value[] = [];
  sp = 0;

  constructor(private readonly limit: number) {}

  push(value: Value): void {
    if (this.sp >= this.limit) throw new Trap("StackExhausted", "operand stack overflow");
    this.items[this.sp++] = value;
  }

  pushAll(values: readonly Value[]): void {
    for (const v of values) this.push(v);
  }

  pop(): Value {
    if (this.sp === 0) throw new Error("operand stack underflow");
    return this.items[--this.sp];
  }

  /** Pop `n` values, returned bottom-first. */
  popN(n: number): Value[] {
    if (n > this.sp) throw new Error("operand stack underflow");
    this.sp -= n;
    return this.items.slice(this.sp, this.sp + n);
  }

  peek(depth = 0): Value | undefined {
    return depth < this.sp ? this.items[this.sp - 1 - depth] : undefined;
  }

  slice(from: number, to = this.sp): Value[] {
    return this.items.slice(from, Math.min(to, this.sp));
  }

  set(index: number, value: Value): void {
    if (index >= this.sp) throw new Error(`no operand at ${index}`);
    this.items[index] = value;
  }

  clear(): void {
    this.items = [];
    this.sp = 0;
  }
}

/** Activation record of one wasm function call. */
export class CallFrame {
  readonly func: WasmFunction;
  readonly locals: Value[];
  /** Operand stack height at entry; this frame's operands live above it. */
  readonly base: number;
  /** Index of the next instruction to execute. */
  pc = 0;
  readonly labels: Label[] = [];

  constructor(func: WasmFunction, args: readonly Value[], base: number) {
    this.func = func;
    this.base = base;
    this.locals = [...args, ...func.body.locals.map(defaultValue)];
  }

  get instructionCount(): number {
    return this.func.body.body.length;
  }

  /** Byte offset of the instruction at `pc` in the module binary. */
  get offset(): number {
    return this.func.body.body[this.pc]?.offset ?? this.func.body.offset;
  }
}
