import { describe, it, expect } from "vitest";
import { decodeModule } from "../../src/binary/decoder.js";
import { DebugSession, type SessionState, type StopEvent } from "../../src/debugger/session.js";
import { ConditionError, DebuggerStateError, EngineError, HostTrap, Trap } from "../../src/errors/errors.js";
import { hostFunction } from "../../src/host/bridge.js";
import { createProcessModule } from "../../src/host/spectest.js";
import { asI32, funcref, i32 } from "../../src/runtime/values.js";
import { buildModule } from "../helpers/wasm.js";

const ADD = buildModule({
  functions: [{
    name: "add",
    export: "add",
    params: ["i32", "i32"],
    results: ["i32"],
    localNames: ["a", "b"],
    body: ["local.get 0", "local.get 1", "i32.add"],
  }],
});

// main: 5 * 2 + 1 through a call to double.
const CALLS = buildModule({
  functions: [
    { name: "double", params: ["i32"], results: ["i32"], body: ["local.get 0", "local.get 0", "i32.add"] },
    { name: "main", export: "main", results: ["i32"], body: ["i32.const 5", "call 0", "i32.const 1", "i32.add"] },
  ],
});

// Counts local 0 up to 10 in a loop; instruction 1 runs once per iteration.
const COUNT = buildModule({
  functions: [{
    name: "count",
    export: "count",
    results: ["i32"],
    locals: ["i32"],
    localNames: ["n"],
    body: [
      "loop",
      "local.get 0",
      "i32.const 1",
      "i32.add",
      "local.tee 0",
      "i32.const 10",
      "i32.lt_s",
      "br_if 0",
      "end",
      "local.get 0",
    ],
  }],
});

const SPIN = buildModule({
  functions: [{ export: "spin", body: ["loop", "br 0", "end"] }],
});

describe("breakpoints", () => {
  it("suspends before the instruction with the operands computed so far", async () => {
    const session = DebugSession.load(ADD);
    const bp = session.setBreakpoint("add", 3);
    session.invoke("add", [i32(2), i32(40)]);

    const stop = await session.run();
    expect(stop.reason).toBe("breakpoint");
    expect(stop.state).toBe("suspended");
    expect(stop.breakpoint?.id).toBe(bp.id);
    expect(stop.location?.funcIndex).toBe(0);
    expect(stop.location?.instrIndex).toBe(3);
    expect(stop.location?.instruction).toBe("end");
    const { module } = decodeModule(ADD);
    expect(stop.location?.offset).toBe(module.functions[0].body[3].offset);

    expect(session.readStack()).toEqual([i32(42)]);
    expect(session.readLocals()).toEqual([i32(2), i32(40)]);
    expect(session.localNames()).toEqual(new Map([[0, "a"], [1, "b"]]));

    const done = await session.run();
    expect(done.reason).toBe("finished");
    expect(done.state).toBe("terminated");
    expect(done.results).toEqual([i32(42)]);
  });

  it("evaluates conditions against the suspended frame", async () => {
    const session = DebugSession.load(COUNT);
    session.setBreakpoint("count", 1, { condition: "$n == 4" });
    session.invoke("count");

    const stop = await session.run();
    expect(stop.reason).toBe("breakpoint");
    expect(stop.breakpoint?.hitCount).toBe(1);
    expect(session.readLocals()).toEqual([i32(4)]);

    const done = await session.run();
    expect(done.results).toEqual([i32(10)]);
  });

  it("lets the ignore count pass before suspending", async () => {
    const session = DebugSession.load(COUNT);
    session.setBreakpoint("count", 1, { ignoreCount: 2 });
    session.invoke("count");

    const stop = await session.run();
    expect(stop.breakpoint?.hitCount).toBe(3);
    expect(session.readLocals()).toEqual([i32(2)]);
  });

  it("treats a condition that fails to evaluate as hit and reports the error", async () => {
    const session = DebugSession.load(COUNT);
    session.setBreakpoint("count", 1, { condition: "local5 > 0" });
    session.invoke("count");

    const stop = await session.run();
    expect(stop.reason).toBe("breakpoint");
    expect(stop.conditionError).toBeInstanceOf(ConditionError);
    expect(session.readLocals()).toEqual([i32(0)]);
  });

  it("rejects a malformed condition when the breakpoint is set", () => {
    const session = DebugSession.load(COUNT);
    expect(() => session.setBreakpoint("count", 1, { condition: "local0 <" })).toThrow(ConditionError);
    expect(session.listBreakpoints()).toEqual([]);
  });

  it("skips disabled breakpoints and can clear them", async () => {
    const session = DebugSession.load(ADD);
    const bp = session.setBreakpoint(0, 2);
    expect(session.toggleBreakpoint(bp.id).enabled).toBe(false);
    session.invoke("add", [i32(1), i32(1)]);
    expect((await session.run()).reason).toBe("finished");

    expect(session.clearBreakpoint(bp.id)).toBe(true);
    expect(session.clearBreakpoint(bp.id)).toBe(false);
    expect(session.listBreakpoints()).toEqual([]);
  });

  it("refuses locations outside a function body", () => {
    const session = DebugSession.load(ADD);
    expect(() => session.setBreakpoint("add", 4)).toThrow(RangeError);
    expect(() => session.setBreakpoint("missing", 0)).toThrow(EngineError);
  });
});

describe("stepping", () => {
  it("executes exactly one instruction when stepping from idle", async () => {
    const session = DebugSession.load(ADD);
    session.invoke("add", [i32(2), i32(3)]);

    const stop = await session.step();
    expect(stop.reason).toBe("step");
    expect(stop.location?.instrIndex).toBe(1);
    expect(session.readStack()).toEqual([i32(2)]);
  });

  it("steps over a call without stopping inside the callee", async () => {
    const session = DebugSession.load(CALLS);
    session.setBreakpoint("main", 1);
    session.invoke("main");
    await session.run();

    const stops: StopEvent[] = [];
    session.on("stop", (e: StopEvent) => stops.push(e));
    const stop = await session.step("over");
    expect(stops).toHaveLength(1);
    expect(stop.reason).toBe("step");
    expect(stop.location?.funcIndex).toBe(1);
    expect(stop.location?.instrIndex).toBe(2);
    expect(session.readStack()).toEqual([i32(10)]);
  });

  it("steps into the callee at the same instruction", async () => {
    const session = DebugSession.load(CALLS);
    session.setBreakpoint("main", 1);
    session.invoke("main");
    await session.run();

    const stop = await session.step("into");
    expect(stop.location?.funcIndex).toBe(0);
    expect(stop.location?.instrIndex).toBe(0);
    expect(session.depth).toBe(2);
    expect(session.readLocals()).toEqual([i32(5)]);
    expect(session.backtrace().map(f => [f.funcIndex, f.instrIndex])).toEqual([[0, 0], [1, 1]]);

    const out = await session.step("out");
    expect(out.location?.funcIndex).toBe(1);
    expect(out.location?.instrIndex).toBe(2);
    expect(session.depth).toBe(1);
  });

  it("does not re-hit the breakpoint it resumes from", async () => {
    const session = DebugSession.load(COUNT);
    session.setBreakpoint("count", 1);
    session.invoke("count");
    await session.run();

    const next = await session.run();
    expect(next.reason).toBe("breakpoint");
    expect(session.readLocals()).toEqual([i32(1)]);
    expect(next.breakpoint?.hitCount).toBe(2);
  });
});

describe("traps", () => {
  const DIV = buildModule({
    memory: { min: 1 },
    globals: [{ type: "i32", mutable: true, init: "i32.const 7" }],
    functions: [{
      export: "div",
      params: ["i32", "i32"],
      results: ["i32"],
      body: [
        "i32.const 0",
        "i32.const 99",
        "i32.store",
        "i32.const 3",
        "global.set 0",
        "local.get 0",
        "local.get 1",
        "i32.div_s",
      ],
    }],
  });

  it("halts at a division by zero with state left as it was before the instruction", async () => {
    const session = DebugSession.load(DIV);
    session.setBreakpoint(0, 7);
    session.invoke("div", [i32(10), i32(0)]);
    await session.run();
    const memoryBefore = session.readMemory(0, 0, 16);
    const globalBefore = session.readGlobal(0);

    const stop = await session.run();
    expect(stop.reason).toBe("trap");
    expect(stop.state).toBe("trapped");
    expect(stop.error).toBeInstanceOf(Trap);
    expect(stop.error instanceof Trap && stop.error.kind).toBe("DivideByZero");
    expect(stop.location?.instrIndex).toBe(7);

    expect(session.readMemory(0, 0, 16)).toEqual(memoryBefore);
    expect(Array.from(memoryBefore.subarray(0, 4))).toEqual([99, 0, 0, 0]);
    expect(session.readGlobal(0)).toEqual(globalBefore);
    expect(globalBefore).toEqual(i32(3));
    expect(session.readStack()).toEqual([i32(10), i32(0)]);
    expect(session.backtrace()).toHaveLength(1);
  });

  it("refuses to resume a trapped execution until a new invoke", async () => {
    const session = DebugSession.load(DIV);
    session.invoke("div", [i32(1), i32(0)]);
    await session.run();
    await expect(session.run()).rejects.toThrow(DebuggerStateError);

    session.invoke("div", [i32(9), i32(3)]);
    expect((await session.run()).results).toEqual([i32(3)]);
  });

  it("keeps every frame of a trap inside a callee", () => {
    const bytes = buildModule({
      functions: [
        { body: ["unreachable"] },
        { export: "main", body: ["nop", "call 0"] },
      ],
    });
    const session = DebugSession.load(bytes);
    session.invoke("main");
    const stop = session.runToCompletion();
    expect(stop.error instanceof Trap && stop.error.kind).toBe("Unreachable");
    expect(session.backtrace().map(f => [f.funcIndex, f.instrIndex])).toEqual([[0, 0], [1, 1]]);
  });

  it("traps with StackExhausted at the configured call depth", () => {
    const bytes = buildModule({ functions: [{ export: "rec", body: ["call 0"] }] });
    const session = DebugSession.load(bytes, undefined, { config: { maxCallDepth: 100 } });
    session.invoke("rec");
    const stop = session.runToCompletion();
    expect(stop.error instanceof Trap && stop.error.kind).toBe("StackExhausted");
    expect(session.depth).toBe(100);
  });
});

describe("memory", () => {
  it("allows an access ending exactly at the memory end and traps one byte past it", () => {
    const bytes = buildModule({
      memory: { min: 1 },
      functions: [
        { export: "load", params: ["i32"], results: ["i32"], body: ["local.get 0", "i32.load"] },
        { export: "loadOffset", params: ["i32"], results: ["i32"], body: ["local.get 0", "i32.load offset=4"] },
      ],
    });
    const session = DebugSession.load(bytes);

    session.invoke("load", [i32(65532)]);
    expect(session.runToCompletion().results).toEqual([i32(0)]);

    session.invoke("load", [i32(65533)]);
    const stop = session.runToCompletion();
    expect(stop.error instanceof Trap && stop.error.kind).toBe("OutOfBoundsMemoryAccess");

    session.invoke("loadOffset", [i32(65528)]);
    expect(session.runToCompletion().reason).toBe("finished");
    session.invoke("loadOffset", [i32(65529)]);
    expect(session.runToCompletion().reason).toBe("trap");
  });

  it("never grows past the declared maximum", () => {
    const bytes = buildModule({
      memory: { min: 1, max: 2 },
      functions: [{ export: "grow", params: ["i32"], results: ["i32"], body: ["local.get 0", "memory.grow"] }],
    });
    const session = DebugSession.load(bytes);
    const grow = (delta: number) => {
      session.invoke("grow", [i32(delta)]);
      return session.runToCompletion().results;
    };

    expect(grow(2)).toEqual([i32(-1)]);
    expect(session.instance.memories[0].pages).toBe(1);
    expect(grow(1)).toEqual([i32(1)]);
    expect(grow(1)).toEqual([i32(-1)]);
    expect(session.instance.memories[0].pages).toBe(2);
    expect(grow(0)).toEqual([i32(2)]);
  });

  it("reads and writes memory from the debugger", async () => {
    const bytes = buildModule({
      memory: { min: 1 },
      datas: [{ offset: 8, bytes: [1, 2, 3] }],
      functions: [{ export: "peek", results: ["i32"], body: ["i32.const 8", "i32.load8_u offset=1"] }],
    });
    const session = DebugSession.load(bytes);
    session.invoke("peek");
    await session.step();
    expect(Array.from(session.readMemory(0, 8, 3))).toEqual([1, 2, 3]);
    session.writeMemory(0, 9, new Uint8Array([200]));
    expect((await session.run()).results).toEqual([i32(200)]);
    expect(() => session.readMemory(0, 65535, 2)).toThrow(RangeError);
    expect(() => session.readMemory(1, 0, 1)).toThrow(RangeError);
  });
});

describe("pause and terminate", () => {
  it("suspends a running session exactly once", async () => {
    const session = DebugSession.load(SPIN, undefined, { config: { sliceSize: 50 } });
    const states: SessionState[] = [];
    session.on("state", (next: SessionState) => states.push(next));
    session.invoke("spin");

    const pending = session.run();
    expect(session.state).toBe("running");
    expect(() => session.readLocals()).toThrow(DebuggerStateError);
    expect(session.pause()).toBe(true);
    expect(session.pause()).toBe(true);

    const stop = await pending;
    expect(stop.reason).toBe("pause");
    expect(stop.state).toBe("suspended");
    expect(states).toEqual(["running", "suspended"]);
    expect(session.pause()).toBe(false);
  });

  it("stops a running session on terminate and refuses later commands", async () => {
    const session = DebugSession.load(SPIN, undefined, { config: { sliceSize: 50 } });
    session.invoke("spin");
    const pending = session.run();
    session.terminate();

    const stop = await pending;
    expect(stop.reason).toBe("terminated");
    expect(session.state).toBe("terminated");
    expect(() => session.invoke("spin")).toThrow(DebuggerStateError);
    expect(() => session.readMemory(0, 0, 1)).toThrow(DebuggerStateError);
  });

  it("tears down a suspended session immediately", async () => {
    const session = DebugSession.load(ADD);
    session.setBreakpoint("add", 2);
    session.invoke("add", [i32(1), i32(2)]);
    await session.run();
    session.terminate();
    expect(session.state).toBe("terminated");
    expect(() => session.readLocals()).toThrow(DebuggerStateError);
  });
});

describe("host calls", () => {
  const HOST = buildModule({
    imports: [
      { module: "env", name: "log", kind: "func", params: ["i32"] },
      { module: "process", name: "exit", kind: "func", params: ["i32"] },
    ],
    functions: [{
      export: "main",
      body: ["i32.const 7", "call 0", "i32.const 3", "call 1", "i32.const 99", "drop"],
    }],
  });

  it("distinguishes a host-requested stop from a trap", async () => {
    const logged: number[] = [];
    const session = DebugSession.load(HOST, {
      env: { log: hostFunction("i32 -> ", ([v]) => { logged.push(asI32(v)); return []; }) },
      process: createProcessModule(),
    });
    session.invoke("main");

    const stop = await session.run();
    expect(stop.reason).toBe("host-trap");
    expect(stop.state).toBe("trapped");
    expect(stop.error).toBeInstanceOf(HostTrap);
    expect(stop.error instanceof HostTrap && stop.error.exitCode).toBe(3);
    expect(stop.error instanceof HostTrap && stop.error.hostFunction).toBe("process.exit");
    expect(stop.location?.instrIndex).toBe(3);
    expect(logged).toEqual([7]);
  });

  it("wraps an error thrown by a host function in a HostTrap", () => {
    const session = DebugSession.load(HOST, {
      env: { log: hostFunction("i32 -> ", () => { throw new Error("boom"); }) },
      process: createProcessModule(),
    });
    session.invoke("main");
    const stop = session.runToCompletion();
    expect(stop.reason).toBe("host-trap");
    expect(stop.error?.message).toBe("host function env.log failed: boom");
  });
});

describe("inspection", () => {
  it("writes locals and globals of a suspended session", async () => {
    const session = DebugSession.load(COUNT);
    const bp = session.setBreakpoint("count", 1, { condition: "local0 == 4" });
    session.invoke("count");
    await session.run();

    expect(() => session.writeLocal(0, { type: "i64", value: 1n })).toThrow(EngineError);
    session.writeLocal(0, i32(20));
    session.clearBreakpoint(bp.id);
    expect((await session.run()).results).toEqual([i32(21)]);
  });

  it("reports watches and evaluates expressions at a stop", async () => {
    const session = DebugSession.load(COUNT);
    session.setBreakpoint("count", 3, { condition: "local0 == 4" });
    const id = session.watch("local0 * 2");
    session.invoke("count");

    const stop = await session.run();
    expect(stop.watches).toEqual([{ id, expression: "local0 * 2", value: "8" }]);
    expect(session.evaluate("stack0 + 1")).toEqual({ kind: "int", value: 2n });
    expect(session.readStack()).toEqual([i32(4), i32(1)]);
    expect(session.expectedStack()).toEqual({ height: 2, types: ["i32", "i32"], reachable: true });
    expect(session.unwatch(id)).toBe(true);
  });

  it("checks the operand stack against validation at every boundary", () => {
    const bytes = buildModule({
      functions: [{
        export: "pick",
        params: ["i32"],
        results: ["i32"],
        body: [
          "block i32",
          "local.get 0",
          "if i32",
          "i32.const 10",
          "else",
          "i32.const 20",
          "end",
          "end",
        ],
      }],
    });
    const session = DebugSession.load(bytes, undefined, { config: { verifyStack: true } });
    session.invoke("pick", [i32(1)]);
    expect(session.runToCompletion().results).toEqual([i32(10)]);
    session.invoke("pick", [i32(0)]);
    expect(session.runToCompletion().results).toEqual([i32(20)]);

    const counting = DebugSession.load(COUNT, undefined, { config: { verifyStack: true } });
    counting.invoke("count");
    expect(counting.runToCompletion().results).toEqual([i32(10)]);
  });

  it("refuses frame reads while idle", () => {
    const session = DebugSession.load(ADD);
    expect(() => session.readLocals()).toThrow(DebuggerStateError);
    expect(() => session.backtrace()).toThrow(DebuggerStateError);
  });

  it("refuses memory, global and table access until execution has stopped", async () => {
    const bytes = buildModule({
      memory: { min: 1 },
      table: { min: 1 },
      globals: [{ type: "i32", mutable: true, init: "i32.const 3" }],
      functions: [{ export: "noop", body: ["nop"] }],
    });
    const session = DebugSession.load(bytes);
    expect(() => session.readMemory(0, 0, 1)).toThrow("cannot inspect while idle");
    expect(() => session.writeGlobal(0, i32(1))).toThrow(DebuggerStateError);
    expect(() => session.readTable(0)).toThrow(DebuggerStateError);

    session.invoke("noop");
    expect(() => session.readGlobal(0)).toThrow("cannot inspect while idle");
    await session.step();
    expect(session.state).toBe("suspended");
    expect(session.readGlobal(0)).toEqual(i32(3));
    expect(session.readTable(0)).toEqual([funcref(null)]);
    expect((await session.run()).reason).toBe("finished");
    expect(Array.from(session.readMemory(0, 0, 2))).toEqual([0, 0]);
  });

  it("resolves a $name against named and exported globals", async () => {
    const bytes = buildModule({
      globals: [
        { type: "i32", init: "i32.const 40", name: "base" },
        { type: "i32", init: "i32.const 2", export: "step" },
      ],
      functions: [{ export: "noop", params: ["i32"], localNames: ["base"], body: ["nop"] }],
    });
    const session = DebugSession.load(bytes);
    session.invoke("noop", [i32(1)]);
    await session.step();
    expect(session.evaluate("global0 + $step")).toEqual({ kind: "int", value: 42n });
    expect(session.evaluate("$base")).toEqual({ kind: "int", value: 1n });
    expect(() => session.evaluate("$other")).toThrow("no local or global named $other (column 1)");
  });
});

describe("loading", () => {
  const WITH_START = buildModule({
    globals: [{ type: "i32", mutable: true, init: "i32.const 0" }],
    functions: [
      { name: "init", body: ["i32.const 5", "global.set 0"] },
      { export: "get", results: ["i32"], body: ["global.get 0"] },
    ],
    start: 0,
  });

  const finish = (session: DebugSession, name: string) => {
    session.invoke(name);
    return session.runToCompletion().results;
  };

  it("runs the start function while loading", () => {
    const session = DebugSession.load(WITH_START);
    expect(session.pendingEntry).toBeUndefined();
    expect(finish(session, "get")).toEqual([i32(5)]);
    expect(session.readGlobal(0)).toEqual(i32(5));
  });

  it("makes the start function the pending entry when debugging it", async () => {
    const session = DebugSession.load(WITH_START, undefined, { debugStart: true });
    expect(session.pendingEntry).toBe("$init");

    const stop = await session.step();
    expect(stop.location?.instrIndex).toBe(1);
    expect(session.readGlobal(0)).toEqual(i32(0));
    expect((await session.run()).reason).toBe("finished");
    expect(session.readGlobal(0)).toEqual(i32(5));
  });

  it("keeps sessions over the same module independent", () => {
    const a = DebugSession.load(WITH_START);
    const b = DebugSession.load(WITH_START);
    finish(a, "get");
    a.writeGlobal(0, i32(1));
    expect(finish(a, "get")).toEqual([i32(1)]);
    expect(finish(b, "get")).toEqual([i32(5)]);
  });

  it("refuses to write an immutable global unless forced", () => {
    const bytes = buildModule({
      globals: [{ type: "i32", init: "i32.const 1" }],
      functions: [{ export: "noop", body: ["nop"] }],
    });
    const session = DebugSession.load(bytes);
    finish(session, "noop");
    expect(() => session.writeGlobal(0, i32(2))).toThrow(EngineError);
    session.writeGlobal(0, i32(2), true);
    expect(session.readGlobal(0)).toEqual(i32(2));
  });

  it("rejects invoking with the wrong arguments", () => {
    const session = DebugSession.load(ADD);
    expect(() => session.invoke("add", [i32(1)])).toThrow(EngineError);
    expect(() => session.invoke("nope")).toThrow(EngineError);
  });
});
