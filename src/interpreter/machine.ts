import { DEFAULT_CONFIG, type EngineConfig } from "../config.js";
import { EngineError, HostTrap, Trap } from "../errors/errors.js";
import { callHost, type HostContext } from "../host/bridge.js";
import type { FunctionInstance, Instance } from "../runtime/instance.js";
import type { Value } from "../runtime/values.js";
import { CallFrame, ValueStack } from "./frame.js";
import { step, type StepOutcome } from "./interpreter.js";

/** What one call to {@link Machine.advance} did. */
export type MachineEvent =
  | { kind: "stepped"; outcome: StepOutcome["kind"] }
  | { kind: "finished"; results: Value[] }
  | { kind: "trapped"; error: Trap | HostTrap };

export type MachineStatus = "idle" | "active" | "finished" | "trapped";

/**
 * Owns the call frame stack and the operand stack and drives the interpreter
 * one instruction at a time. Calls never recurse on the host stack: a call
 * pushes a frame, a return pops one.
 */
export class Machine {
  readonly stack: ValueStack;
  readonly frames: CallFrame[] = [];
  private readonly config: EngineConfig;
  private state: MachineStatus = "idle";
  private results: Value[] = [];
  private fault?: Trap | HostTrap;

  constructor(config: EngineConfig = DEFAULT_CONFIG) {
    this.config = config;
    this.stack = new ValueStack(config.maxValueStack);
  }

  get status(): MachineStatus {
    return this.state;
  }

  get top(): CallFrame | undefined {
    return this.frames[this.frames.length - 1];
  }

  get depth(): number {
    return this.frames.length;
  }

  get lastResults(): Value[] {
    return this.results;
  }

  get error(): Trap | HostTrap | undefined {
    return this.fault;
  }

  /** Discard any execution in progress and prepare a call of `fn`. */
  enter(fn: FunctionInstance, args: readonly Value[]): void {
    const { params } = fn.type;
    if (args.length !== params.length) {
      throw new EngineError(`${fn.name} expects ${params.length} argument(s), got ${args.length}`);
    }
    args.forEach((a, i) => {
      if (a.type !== params[i]) throw new EngineError(`argument ${i} of ${fn.name} must be ${params[i]}, got ${a.type}`);
    });
    this.reset();
    if (fn.kind === "host") {
      // A host function given as the entry point runs as soon as it is entered.
      const result = callHost(fn.host, [...args], this.hostContext(fn, undefined));
      if (result.ok) this.finish(result.results);
      else this.trap(result.error);
      return;
    }
    this.frames.push(new CallFrame(fn, args, 0));
    this.state = "active";
  }

  reset(): void {
    this.frames.length = 0;
    this.stack.clear();
    this.results = [];
    this.fault = undefined;
    this.state = "idle";
  }

  /** Execute one instruction of the innermost frame, including the frame push or pop it causes. */
  advance(): MachineEvent {
    const frame = this.top;
    if (this.state !== "active" || !frame) throw new EngineError(`cannot advance a machine that is ${this.state}`);
    if (this.config.verifyStack) this.verify(frame);
    const before = this.stack.sp;
    const instance = frame.func.instance;
    const outcome = step(instance, frame, this.stack);

    switch (outcome.kind) {
      case "continue":
      case "branch":
        return { kind: "stepped", outcome: outcome.kind };
      case "trap":
        this.stack.sp = before;
        return this.trap(outcome.trap);
      case "return": {
        const arity = frame.func.type.results.length;
        const results = this.stack.popN(arity);
        this.stack.sp = frame.base;
        this.frames.pop();
        if (this.frames.length === 0) return this.finish(results);
        this.stack.pushAll(results);
        const caller = this.top;
        if (caller) caller.pc++;
        return { kind: "stepped", outcome: "return" };
      }
      case "call":
        return this.call(frame, instance, outcome.callee, before);
    }
  }

  /** Compare the frame's operands with the validator's snapshot for this boundary. */
  private verify(frame: CallFrame): void {
    const snapshot = frame.func.meta.stack[frame.pc];
    if (!snapshot?.reachable) return;
    const actual = this.stack.slice(frame.base).map(v => v.type);
    const matches = actual.length === snapshot.height
      && snapshot.types.every((t, i) => t === "unknown" || t === actual[i]);
    if (!matches) {
      throw new EngineError(
        `operand stack of ${frame.func.name} at instruction ${frame.pc} is [${actual.join(" ")}], `
        + `validation computed [${snapshot.types.join(" ")}]`,
      );
    }
  }

  /**
   * The caller's pc moves past a `call` only once the callee has returned, so
   * while a callee runs every frame below it still points at its call site.
   */
  private call(caller: CallFrame, instance: Instance, callee: FunctionInstance, before: number): MachineEvent {
    const args = this.stack.popN(callee.type.params.length);
    if (callee.kind === "host") {
      const result = callHost(callee.host, args, this.hostContext(callee, instance));
      if (!result.ok) {
        this.stack.sp = before;
        return this.trap(result.error);
      }
      try {
        this.stack.pushAll(result.results);
      } catch (e) {
        if (!(e instanceof Trap)) throw e;
        this.stack.sp = before;
        return this.trap(e);
      }
      caller.pc++;
      return { kind: "stepped", outcome: "call" };
    }
    if (this.frames.length >= this.config.maxCallDepth) {
      this.stack.sp = before;
      return this.trap(new Trap("StackExhausted"));
    }
    this.frames.push(new CallFrame(callee, args, this.stack.sp));
    return { kind: "stepped", outcome: "call" };
  }

  private hostContext(callee: FunctionInstance, instance: Instance | undefined): HostContext {
    return {
      callee: callee.name,
      memory: (index = 0) => instance?.memories[index],
    };
  }

  private finish(results: Value[]): MachineEvent {
    this.results = results;
    this.state = "finished";
    return { kind: "finished", results };
  }

  private trap(error: Trap | HostTrap): MachineEvent {
    this.fault = error;
    this.state = "trapped";
    return { kind: "trapped", error };
  }

  /** Run the current entry to completion without any debugger hooks. */
  runToEnd(): Value[] {
    while (this.state === "active") {
      const event = this.advance();
      if (event.kind === "trapped") throw event.error;
    }
    if (this.state === "trapped" && this.fault) throw this.fault;
    return this.results;
  }
}

/** Call `fn` to completion on a fresh machine. Throws the Trap or HostTrap that stopped it. */
export function invokeFunction(fn: FunctionInstance, args: readonly Value[], config: EngineConfig = DEFAULT_CONFIG): Value[] {
  const machine = new Machine(config);
  machine.enter(fn, args);
  return machine.runToEnd();
}
