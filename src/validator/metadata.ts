import type { FuncType, Module, ValueType } from "../binary/module.js";

/** A slot of the abstract operand stack; "unknown" only appears in unreachable code. */
export type StackType = ValueType | "unknown";

/** Operand stack shape before an instruction, relative to the frame's base. */
export interface StackSnapshot {
  height: number;
  types: readonly StackType[];
  /** False inside code that follows `unreachable`, `br`, `return` and the like. */
  reachable: boolean;
}

export interface FunctionMetadata {
  /** Index in the module's function index space (imports included). */
  funcIndex: number;
  type: FuncType;
  /** Parameters followed by declared locals. */
  locals: ValueType[];
  /** `stack[pc]` is the snapshot before instruction `pc`. */
  stack: StackSnapshot[];
  /** `block`/`loop`/`if` index to the index of its matching `end`. */
  blockEnd: Map<number, number>;
  /** `if` index to the index of its `else`, when it has one. */
  elseAt: Map<number, number>;
  maxHeight: number;
}

/** A module that passed validation, with the static facts the interpreter relies on. */
export interface ValidatedModule {
  module: Module;
  /** Metadata of each defined function, indexed like `module.functions`. */
  functions: FunctionMetadata[];
}
