import { EventEmitter } from "node:events";
import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { decodeModule } from "../binary/decoder.js";
import { functionName } from "../binary/module.js";
import { formatInstruction } from "../binary/print.js";
import { resolveConfig, type EngineConfig } from "../config.js";
import { ConditionError, DebuggerStateError, EngineError, HostTrap, Trap } from "../errors/errors.js";
import type { CallFrame } from "../interpreter/frame.js";
import { Machine } from "../interpreter/machine.js";
import type { FunctionInstance, Instance } from "../runtime/instance.js";
import { Linker, type Imports } from "../runtime/linker.js";
import type { MemoryInstance } from "../runtime/memory.js";
import type { Value } from "../runtime/values.js";
import type { StackSnapshot, ValidatedModule } from "../validator/metadata.js";
import { validateModule } from "../validator/validator.js";
import { BreakpointTable, type Breakpoint, type BreakpointHit, type BreakpointOptions } from "./breakpoints.js";
import {
  evaluateCondition, formatScalar, parseCondition,
  type ConditionExpr, type EvalContext, type Scalar,
} from "./condition.js";

export type SessionState = "idle" | "running" | "suspended" | "terminated" | "trapped";

export const STEP_GRANULARITIES = ["instruction", "over", "into", "out"] as const;

export type StepGranularity = (typeof STEP_GRANULARITIES)[number];

export function isStepGranularity(text: string): text is StepGranularity {
  return (STEP_GRANULARITIES as readonly string[]).includes(text);
}

export type StopReason = "breakpoint" | "step" | "pause" | "finished" | "trap" | "host-trap" | "terminated";

/** One entry of a backtrace; also where a stop happened. */
export interface FrameInfo {
  /** 0 is the innermost frame. */
  index: number;
  funcIndex: number;
  name: string;
  /** Index of the next instruction to execute (the faulting one after a trap). */
  instrIndex: number;
  /** Byte offset of that instruction in the module binary. */
  offset: number;
  instruction: string;
}

export interface WatchResult {
  id: number;
  expression: string;
  value?: string;
  error?: string;
}

export interface StopEvent {
  reason: StopReason;
  state: SessionState;
  location?: FrameInfo;
  breakpoint?: Breakpoint;
  conditionError?: ConditionError;
  results?: Value[];
  error?: Trap | HostTrap;
  watches?: WatchResult[];
}

export interface SessionOptions {
  config?: Partial<EngineConfig>;
  /** Do not run the start function while loading; make it the pending entry instead. */
  debugStart?: boolean;
  /** Name used in diagnostics. */
  source?: string;
}

interface StepGoal {
  granularity: StepGranularity;
  /** Call depth when the step was requested. */
  depth: number;
}

interface Watch {
  id: number;
  expression: string;
  parsed: ConditionExpr;
}

/**
 * A debugging session over one instance. Owns the interpreter, the
 * breakpoints and the state cell; all control goes through its methods.
 *
 * Emits `"state"` (next, previous) on every transition and `"stop"` with the
 * {@link StopEvent} whenever execution stops.
 */
export class DebugSession extends EventEmitter {
  readonly config: EngineConfig;
  private live?: Instance;
  private readonly machine: Machine;
  private readonly breakpoints = new BreakpointTable();
  private watchList: Watch[] = [];
  private nextWatchId = 1;
  private current: SessionState = "idle";
  private entry?: { fn: FunctionInstance; args: Value[] };
  private goal?: StepGoal;
  private executed = 0;
  /** Set on resume from a suspension: the first boundary is not checked for breakpoints. */
  private resuming = false;
  private pauseRequested = false;
  private terminateRequested = false;

  constructor(instance: Instance, config: EngineConfig) {
    super();
    this.live = instance;
    this.config = config;
    this.machine = new Machine(config);
  }

  /**
   * Decode, validate and instantiate a module. Throws the DecodeError,
   * ValidationError or InstantiationError that stopped loading.
   */
  static load(bytes: Uint8Array, imports?: Imports | Linker, options: SessionOptions = {}): DebugSession {
    const { module } = decodeModule(bytes, options.source);
    return DebugSession.fromValidated(validateModule(module), imports, options);
  }

  static fromValidated(validated: ValidatedModule, imports?: Imports | Linker, options: SessionOptions = {}): DebugSession {
    const config = resolveConfig(options.config ?? {});
    const { instance, start } = Linker.from(imports).instantiate(validated, { config, deferStart: options.debugStart });
    const session = new DebugSession(instance, config);
    if (start) session.entry = { fn: start, args: [] };
    return session;
  }

  get state(): SessionState {
    return this.current;
  }

  get instance(): Instance {
    return this.requireLive();
  }

  private requireLive(): Instance {
    if (!this.live) throw new DebuggerStateError("session has been terminated");
    return this.live;
  }

  /** Frames on the call stack. */
  get depth(): number {
    return this.machine.depth;
  }

  // ============================================================
  // Execution control
  // ============================================================

  /**
   * Prepare a call of an exported function (by name) or of any function (by
   * index). Discards a finished, trapped or suspended execution.
   */
  invoke(target: string | number, args: readonly Value[] = []): void {
    const instance = this.instance;
    if (this.current === "running") throw new DebuggerStateError("cannot invoke while running");
    const fn = typeof target === "number" ? instance.functions[target] : instance.exportedFunction(target);
    if (!fn) throw new EngineError(`no function ${typeof target === "number" ? target : `exported as '${target}'`}`);
    const { params } = fn.type;
    if (args.length !== params.length) {
      throw new EngineError(`${fn.name} expects ${params.length} argument(s), got ${args.length}`);
    }
    args.forEach((a, i) => {
      if (a.type !== params[i]) throw new EngineError(`argument ${i} of ${fn.name} must be ${params[i]}, got ${a.type}`);
    });
    this.machine.reset();
    this.entry = { fn, args: [...args] };
    this.setState("idle");
  }

  /** Run until a breakpoint, a pause request, the end of the entry function or a trap. */
  async run(): Promise<StopEvent> {
    return this.drive(undefined);
  }

  async step(granularity: StepGranularity = "instruction"): Promise<StopEvent> {
    return this.drive(granularity);
  }

  /**
   * Run without yielding to the event loop. Breakpoints still suspend;
   * a pause request cannot arrive.
   */
  runToCompletion(): StopEvent {
    const early = this.begin(undefined);
    if (early) return early;
    for (;;) {
      const stop = this.runSlice(this.config.sliceSize);
      if (stop) return stop;
    }
  }

  /**
   * Ask a running session to suspend at the next instruction boundary.
   * Returns false when the session is not running.
   */
  pause(): boolean {
    if (this.current !== "running") return false;
    this.pauseRequested = true;
    return true;
  }

  /**
   * Cancel the session: frames, stacks and the instance are released and
   * every later command is refused. A running session stops at its next
   * boundary, its pending run resolving with reason `terminated`.
   */
  terminate(): void {
    if (!this.live) return;
    if (this.current === "running") {
      this.terminateRequested = true;
      return;
    }
    this.teardown();
  }

  private async drive(granularity: StepGranularity | undefined): Promise<StopEvent> {
    const early = this.begin(granularity);
    if (early) return early;
    for (;;) {
      const stop = this.runSlice(this.config.sliceSize);
      if (stop) return stop;
      await yieldToEventLoop();
    }
  }

  /** Enter the running state; returns a stop event when the entry completed on the spot. */
  private begin(granularity: StepGranularity | undefined): StopEvent | undefined {
    this.requireLive();
    switch (this.current) {
      case "running":
        throw new DebuggerStateError("session is already running");
      case "trapped":
        throw new DebuggerStateError("execution trapped; invoke a function to start again");
      case "terminated":
        throw new DebuggerStateError("execution has finished; invoke a function to start again");
      case "idle": {
        if (!this.entry) throw new DebuggerStateError("nothing to run; invoke a function first");
        const { fn, args } = this.entry;
        this.entry = undefined;
        this.machine.enter(fn, args);
        this.resuming = false;
        if (this.machine.status !== "active") return this.settle();
        break;
      }
      case "suspended":
        this.resuming = true;
        break;
    }
    this.goal = granularity === undefined ? undefined : { granularity, depth: this.machine.depth };
    this.executed = 0;
    this.pauseRequested = false;
    this.terminateRequested = false;
    this.setState("running");
    return undefined;
  }

  /** Execute up to `budget` instructions; undefined when the budget ran out first. */
  private runSlice(budget: number): StopEvent | undefined {
    for (let n = 0; n < budget; n++) {
      const frame = this.machine.top;
      if (this.machine.status !== "active" || !frame) return this.settle();
      if (this.terminateRequested) return this.teardown();

      if (this.resuming) {
        this.resuming = false;
      } else {
        const hit = this.checkBreakpoint(frame);
        if (hit) return this.suspend("breakpoint", hit);
      }
      if (this.stepSatisfied()) return this.suspend("step");
      if (this.pauseRequested) return this.suspend("pause");

      const event = this.machine.advance();
      this.executed++;
      if (event.kind !== "stepped") return this.settle();
    }
    return undefined;
  }

  private checkBreakpoint(frame: CallFrame): BreakpointHit | undefined {
    if (this.breakpoints.size === 0 || frame.func.instance !== this.live) return undefined;
    return this.breakpoints.check(frame.func.funcIndex, frame.pc, this.context(frame));
  }

  private stepSatisfied(): boolean {
    if (!this.goal || this.executed === 0) return false;
    switch (this.goal.granularity) {
      case "instruction":
      case "into":
        return true;
      case "over":
        return this.machine.depth <= this.goal.depth;
      case "out":
        return this.machine.depth < this.goal.depth;
    }
  }

  private settle(): StopEvent {
    const error = this.machine.error;
    if (this.machine.status === "trapped" && error) {
      this.setState("trapped");
      return this.stop({ reason: error instanceof HostTrap ? "host-trap" : "trap", error, location: this.frameInfo(0) });
    }
    this.setState("terminated");
    return this.stop({ reason: "finished", results: [...this.machine.lastResults] });
  }

  private suspend(reason: StopReason, hit?: BreakpointHit): StopEvent {
    this.setState("suspended");
    return this.stop({
      reason,
      location: this.frameInfo(0),
      breakpoint: hit?.breakpoint,
      conditionError: hit?.conditionError,
    });
  }

  private teardown(): StopEvent {
    this.machine.reset();
    this.live = undefined;
    this.entry = undefined;
    this.watchList = [];
    this.setState("terminated");
    return this.stop({ reason: "terminated" });
  }

  private stop(fields: Omit<StopEvent, "state" | "watches">): StopEvent {
    this.goal = undefined;
    this.pauseRequested = false;
    this.terminateRequested = false;
    const event: StopEvent = { ...fields, state: this.current };
    if (this.watchList.length > 0 && this.machine.top) event.watches = this.watches();
    this.emit("stop", event);
    return event;
  }

  private setState(next: SessionState): void {
    const previous = this.current;
    this.current = next;
    if (previous !== next) this.emit("state", next, previous);
  }

  // ============================================================
  // Breakpoints and watches
  // ============================================================

  /**
   * Set a breakpoint before instruction `instrIndex` of a defined function,
   * given by index, export name or name-section name (with or without `$`).
   */
  setBreakpoint(func: number | string, instrIndex = 0, options: BreakpointOptions = {}): Breakpoint {
    const fn = this.resolveFunction(func);
    if (fn.kind !== "wasm") throw new EngineError(`${fn.name} is a host function`);
    if (!Number.isInteger(instrIndex) || instrIndex < 0 || instrIndex >= fn.body.body.length) {
      throw new RangeError(`${fn.name} has no instruction ${instrIndex} (it has ${fn.body.body.length})`);
    }
    return this.breakpoints.add(fn.funcIndex, instrIndex, options);
  }

  clearBreakpoint(id: number): boolean {
    return this.breakpoints.remove(id);
  }

  toggleBreakpoint(id: number, enabled?: boolean): Breakpoint {
    const bp = this.breakpoints.toggle(id, enabled);
    if (!bp) throw new RangeError(`no breakpoint ${id}`);
    return { ...bp };
  }

  listBreakpoints(): Breakpoint[] {
    return this.breakpoints.list();
  }

  /** Register an expression evaluated at every stop. Throws ConditionError when malformed. */
  watch(expression: string): number {
    const parsed = parseCondition(expression);
    const id = this.nextWatchId++;
    this.watchList.push({ id, expression, parsed });
    return id;
  }

  unwatch(id: number): boolean {
    const before = this.watchList.length;
    this.watchList = this.watchList.filter(w => w.id !== id);
    return this.watchList.length !== before;
  }

  watches(): WatchResult[] {
    const context = this.context(this.machine.top);
    return this.watchList.map(({ id, expression, parsed }) => {
      try {
        return { id, expression, value: formatScalar(evaluateCondition(parsed, context)) };
      } catch (e) {
        if (!(e instanceof ConditionError)) throw e;
        return { id, expression, error: e.message };
      }
    });
  }

  /** Evaluate an expression against the innermost frame. */
  evaluate(expression: string): Scalar {
    this.requireStopped();
    return evaluateCondition(parseCondition(expression), this.context(this.machine.top));
  }

  private resolveFunction(func: number | string): FunctionInstance {
    const instance = this.instance;
    if (typeof func === "number") {
      const fn = instance.functions[func];
      if (!fn) throw new RangeError(`no function ${func}`);
      return fn;
    }
    const exported = instance.exportedFunction(func);
    if (exported) return exported;
    const bare = func.startsWith("$") ? func.slice(1) : func;
    for (const [index, name] of instance.module.names.functions) {
      const fn = instance.functions[index];
      if (name === bare && fn) return fn;
    }
    throw new EngineError(`no function named '${func}'`);
  }

  private context(frame: CallFrame | undefined): EvalContext {
    const stack = this.machine.stack;
    return {
      local: index => frame?.locals[index],
      localIndex: name => (frame ? this.localIndex(frame, name) : undefined),
      global: index => this.live?.globals[index]?.value,
      globalIndex: name => this.globalIndex(name),
      operand: depth => (frame && depth < stack.sp - frame.base ? stack.peek(depth) : undefined),
    };
  }

  private localIndex(frame: CallFrame, name: string): number | undefined {
    const names = frame.func.instance.module.names.locals.get(frame.func.funcIndex);
    if (!names) return undefined;
    for (const [index, local] of names) if (local === name) return index;
    return undefined;
  }

  /** A global by its name-section name, else by export name. */
  private globalIndex(name: string): number | undefined {
    const instance = this.live;
    if (!instance) return undefined;
    for (const [index, global] of instance.module.names.globals) if (global === name) return index;
    const exported = instance.exports.get(name);
    if (exported?.kind !== "global") return undefined;
    const index = instance.globals.indexOf(exported.value);
    return index < 0 ? undefined : index;
  }

  // ============================================================
  // Inspection
  // ============================================================

  /** Frame reads need a frame to read from: the session must be suspended or trapped. */
  private requireStopped(): void {
    this.requireLive();
    if (this.current !== "suspended" && this.current !== "trapped") {
      throw new DebuggerStateError(`cannot inspect frames while ${this.current}`);
    }
  }

  /**
   * Memory, global and table access needs execution stopped at a boundary:
   * suspended, trapped, or terminated after returning from the outermost frame.
   */
  private requireInspectable(): Instance {
    const instance = this.instance;
    switch (this.current) {
      case "suspended":
      case "trapped":
      case "terminated":
        return instance;
      case "idle":
      case "running":
        throw new DebuggerStateError(`cannot inspect while ${this.current}`);
    }
  }

  private frameAt(index: number): CallFrame {
    this.requireStopped();
    const frames = this.machine.frames;
    const frame = frames[frames.length - 1 - index];
    if (index < 0 || !frame) throw new RangeError(`no frame ${index} (call depth is ${frames.length})`);
    return frame;
  }

  private frameInfo(index: number): FrameInfo | undefined {
    const frames = this.machine.frames;
    const frame = frames[frames.length - 1 - index];
    if (!frame) return undefined;
    const instr = frame.func.body.body[frame.pc];
    return {
      index,
      funcIndex: frame.func.funcIndex,
      name: frame.func.name,
      instrIndex: frame.pc,
      offset: frame.offset,
      instruction: instr ? formatInstruction(instr) : "<end>",
    };
  }

  readLocals(frameIndex = 0): Value[] {
    return [...this.frameAt(frameIndex).locals];
  }

  /** Names of a frame's locals from the name section, by local index. */
  localNames(frameIndex = 0): Map<number, string> {
    const frame = this.frameAt(frameIndex);
    return new Map(frame.func.instance.module.names.locals.get(frame.func.funcIndex));
  }

  writeLocal(index: number, value: Value, frameIndex = 0): void {
    const frame = this.frameAt(frameIndex);
    const current = frame.locals[index];
    if (!current) throw new RangeError(`${frame.func.name} has no local ${index}`);
    if (current.type !== value.type) throw new EngineError(`local ${index} is ${current.type}, got ${value.type}`);
    frame.locals[index] = value;
  }

  /** The frame's operands, bottom first. */
  readStack(frameIndex = 0): Value[] {
    const frame = this.frameAt(frameIndex);
    const frames = this.machine.frames;
    const above = frames[frames.length - frameIndex];
    return this.machine.stack.slice(frame.base, above ? above.base : this.machine.stack.sp);
  }

  /** The operand stack shape the validator computed for the frame's current boundary. */
  expectedStack(frameIndex = 0): StackSnapshot | undefined {
    const frame = this.frameAt(frameIndex);
    return frame.func.meta.stack[frame.pc];
  }

  backtrace(): FrameInfo[] {
    this.requireStopped();
    const out: FrameInfo[] = [];
    for (let i = 0; i < this.machine.depth; i++) {
      const info = this.frameInfo(i);
      if (info) out.push(info);
    }
    return out;
  }

  readMemory(memIndex: number, offset: number, length: number): Uint8Array {
    const memory = this.memoryAt(memIndex);
    this.checkSpan(offset, length, memory.byteLength, `memory ${memIndex}`);
    return memory.read(offset, length);
  }

  writeMemory(memIndex: number, offset: number, data: Uint8Array): void {
    const memory = this.memoryAt(memIndex);
    this.checkSpan(offset, data.length, memory.byteLength, `memory ${memIndex}`);
    memory.write(offset, data);
  }

  readGlobal(index: number): Value {
    const global = this.requireInspectable().globals[index];
    if (!global) throw new RangeError(`no global ${index}`);
    return global.value;
  }

  /** Assign a global; `force` allows writing an immutable one. */
  writeGlobal(index: number, value: Value, force = false): void {
    const global = this.requireInspectable().globals[index];
    if (!global) throw new RangeError(`no global ${index}`);
    global.assign(value, force);
  }

  readTable(tableIndex: number, start = 0, count?: number): Value[] {
    const table = this.requireInspectable().tables[tableIndex];
    if (!table) throw new RangeError(`no table ${tableIndex}`);
    const length = count ?? table.size - start;
    this.checkSpan(start, length, table.size, `table ${tableIndex}`);
    return table.entries().slice(start, start + length);
  }

  private memoryAt(index: number): MemoryInstance {
    const memory = this.requireInspectable().memories[index];
    if (!memory) throw new RangeError(`no memory ${index}`);
    return memory;
  }

  private checkSpan(start: number, length: number, size: number, what: string): void {
    if (!Number.isInteger(start) || !Number.isInteger(length) || start < 0 || length < 0 || start + length > size) {
      throw new RangeError(`${what}: range ${start}+${length} is outside its ${size} entries`);
    }
  }

  /** The entry the next `run()` or `step()` starts, when idle. */
  get pendingEntry(): string | undefined {
    return this.entry?.fn.name;
  }

  /** Display name of a function index in this session's module. */
  functionName(funcIndex: number): string {
    return functionName(this.instance.module, funcIndex);
  }
}
