import { error, type Diagnostic, type Location } from "./diagnostic.js";

/** Base class for everything the engine raises on purpose. */
export class EngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class DecodeError extends EngineError {
  readonly reason: string;
  readonly offset: number;

  constructor(reason: string, offset: number) {
    super(`${reason} (at byte 0x${offset.toString(16)})`);
    this.reason = reason;
    this.offset = offset;
  }

  toDiagnostic(source: string): Diagnostic {
    return error(this.reason, { offset: this.offset, source });
  }
}

export class ValidationError extends EngineError {
  readonly reason: string;
  readonly funcIndex?: number;
  readonly instrIndex?: number;
  readonly offset: number;

  constructor(reason: string, offset: number, funcIndex?: number, instrIndex?: number) {
    const where = funcIndex === undefined
      ? ""
      : instrIndex === undefined
        ? ` in function ${funcIndex}`
        : ` in function ${funcIndex} at instruction ${instrIndex}`;
    super(`${reason}${where}`);
    this.reason = reason;
    this.offset = offset;
    this.funcIndex = funcIndex;
    this.instrIndex = instrIndex;
  }

  toDiagnostic(source: string): Diagnostic {
    const location: Location = {
      offset: this.offset,
      funcIndex: this.funcIndex,
      instrIndex: this.instrIndex,
      source,
    };
    return error(this.reason, location);
  }
}

export class InstantiationError extends EngineError {
  /** Set when the start function faulted. */
  readonly trap?: Trap | HostTrap;

  constructor(message: string, trap?: Trap | HostTrap) {
    super(message);
    this.trap = trap;
  }
}

export type TrapKind =
  | "Unreachable"
  | "DivideByZero"
  | "IntegerOverflow"
  | "InvalidConversionToInteger"
  | "OutOfBoundsMemoryAccess"
  | "OutOfBoundsTableAccess"
  | "UndefinedElement"
  | "UninitializedElement"
  | "IndirectCallTypeMismatch"
  | "StackExhausted"
  | "HostResultMismatch";

// Wording of the WebAssembly reference test suite, so harnesses can match on it.
export const TRAP_MESSAGES: Record<TrapKind, string> = {
  Unreachable: "unreachable",
  DivideByZero: "integer divide by zero",
  IntegerOverflow: "integer overflow",
  InvalidConversionToInteger: "invalid conversion to integer",
  OutOfBoundsMemoryAccess: "out of bounds memory access",
  OutOfBoundsTableAccess: "out of bounds table access",
  UndefinedElement: "undefined element",
  UninitializedElement: "uninitialized element",
  IndirectCallTypeMismatch: "indirect call type mismatch",
  StackExhausted: "call stack exhausted",
  HostResultMismatch: "host function returned values of the wrong type",
};

/** A fault raised by the virtual machine itself. */
export class Trap extends EngineError {
  readonly kind: TrapKind;

  constructor(kind: TrapKind, detail?: string) {
    super(detail ? `${TRAP_MESSAGES[kind]}: ${detail}` : TRAP_MESSAGES[kind]);
    this.kind = kind;
  }
}

/**
 * Raised by a host function to stop the program (`proc_exit` and friends).
 * Kept apart from {@link Trap}: the program asked to stop, it did not crash.
 */
export class HostTrap extends EngineError {
  readonly exitCode?: number;
  readonly hostFunction?: string;

  constructor(message: string, exitCode?: number, hostFunction?: string) {
    super(message);
    this.exitCode = exitCode;
    this.hostFunction = hostFunction;
  }
}

export class DebuggerStateError extends EngineError {}

export class ConditionError extends EngineError {
  readonly column: number;

  constructor(message: string, column: number) {
    super(`${message} (column ${column})`);
    this.column = column;
  }
}
