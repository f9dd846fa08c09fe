#!/usr/bin/env node
import chalk from "chalk";
import { Command } from "commander";
import { readFile } from "node:fs/promises";
import { binaryToWat, isTextFormat, watToBinary } from "./binary/text.js";
import { configFromEnv, loadProjectConfig, resolveConfig, type EngineConfig, type ProjectConfig } from "./config.js";
import { parseBreakpointSpec } from "./debugger/breakpoints.js";
import { DebugSession, isStepGranularity, type StopEvent } from "./debugger/session.js";
import { HostTrap } from "./errors/errors.js";
import { formatDiagnostics } from "./errors/reporter.js";
import { createProcessModule, createSpectest } from "./host/spectest.js";
import { formatSummary, summarizeModule } from "./inspect.js";
import { loadModule, type LoadResult } from "./loader.js";
import type { Imports } from "./runtime/linker.js";
import { formatValue, parseValue, type Value } from "./runtime/values.js";

async function readModuleBytes(file: string): Promise<Uint8Array> {
  if (isTextFormat(file)) return watToBinary(await readFile(file, "utf-8"));
  return new Uint8Array(await readFile(file));
}

/** Load a module file, printing diagnostics; exits on errors. */
async function loadOrExit(file: string): Promise<{ bytes: Uint8Array; result: LoadResult }> {
  const bytes = await readModuleBytes(file);
  const result = loadModule(bytes, file);
  if (result.warnings.length > 0) console.error(formatDiagnostics(bytes, result.warnings));
  if (result.errors.length > 0) {
    console.error(formatDiagnostics(bytes, result.errors));
    process.exit(1);
  }
  return { bytes, result };
}

function hostImports(): Imports {
  return {
    spectest: createSpectest(line => console.log(line)),
    process: createProcessModule(),
  };
}

async function projectSettings(file: string): Promise<{ project: ProjectConfig; config: EngineConfig }> {
  const project = await loadProjectConfig(file);
  return { project, config: resolveConfig(project.engine ?? {}, configFromEnv()) };
}

/** Open a session and prepare a call of `entry` with command-line arguments. */
function openSession(
  result: LoadResult,
  config: EngineConfig,
  entry: string,
  rawArgs: string[],
  debugStart = false,
): DebugSession {
  if (!result.validated) throw new Error("module did not validate");
  const session = DebugSession.fromValidated(result.validated, hostImports(), { config, debugStart });
  if (debugStart && session.pendingEntry !== undefined) return session;
  const fn = session.instance.exportedFunction(entry);
  if (!fn) {
    const available = [...session.instance.exports].filter(([, e]) => e.kind === "func").map(([name]) => name);
    throw new Error(`Function '${entry}' not found in exports. Available: ${available.join(", ")}`);
  }
  if (rawArgs.length !== fn.type.params.length) {
    throw new Error(`'${entry}' takes ${fn.type.params.length} argument(s) (${fn.type.params.join(", ")}), got ${rawArgs.length}`);
  }
  const args: Value[] = rawArgs.map((a, i) => parseValue(a, fn.type.params[i]));
  session.invoke(entry, args);
  return session;
}

function printStop(session: DebugSession, event: StopEvent): void {
  const label = event.reason === "trap" || event.reason === "host-trap" ? chalk.red.bold(event.reason) : chalk.cyan.bold(event.reason);
  const loc = event.location;
  const where = loc ? ` ${loc.name} @${loc.instrIndex} (0x${loc.offset.toString(16)}) ${chalk.bold(loc.instruction)}` : "";
  console.log(`[${label}]${where}`);
  if (event.breakpoint) console.log(`  breakpoint #${event.breakpoint.id} (hit ${event.breakpoint.hitCount})`);
  if (event.conditionError) console.log(chalk.yellow(`  condition failed: ${event.conditionError.message}`));
  if (event.error) console.log(chalk.red(`  ${event.error.message}`));
  if (event.results) console.log(`  results: ${event.results.map(formatValue).join(" ") || "(none)"}`);
  if (event.state === "suspended" || event.state === "trapped") {
    const names = session.localNames();
    const locals = session.readLocals().map((v, i) => `${names.has(i) ? `$${names.get(i)}` : i}=${formatValue(v)}`);
    console.log(`  locals: ${locals.join(" ") || "(none)"}`);
    console.log(`  stack:  ${session.readStack().map(formatValue).join(" ") || "(empty)"}`);
  }
  if (event.state === "trapped") {
    for (const frame of session.backtrace()) {
      console.log(`  #${frame.index} ${frame.name} @${frame.instrIndex} (0x${frame.offset.toString(16)}) ${frame.instruction}`);
    }
  }
  for (const w of event.watches ?? []) {
    console.log(`  watch ${w.expression} = ${w.value ?? chalk.yellow(w.error ?? "?")}`);
  }
}

function exitFor(event: StopEvent): void {
  if (event.error instanceof HostTrap && event.error.exitCode !== undefined) {
    process.exit(event.error.exitCode);
  }
  if (event.reason === "trap" || event.reason === "host-trap") process.exit(1);
}

const program = new Command()
  .name("wasmscope")
  .description("WebAssembly interpreter and debugger")
  .version("0.1.0");

program
  .command("inspect <file>")
  .description("Decode and validate a module (.wasm or .wat) and print its structure")
  .option("--wat", "Print the module as WebAssembly text")
  .option("--json", "Print the structure as JSON")
  .action(async (file: string, opts: Record<string, unknown>) => {
    try {
      const { bytes, result } = await loadOrExit(file);
      if (opts.wat) {
        console.log(binaryToWat(bytes));
        return;
      }
      if (!result.module) return;
      const summary = summarizeModule(result.module);
      if (opts.json) {
        console.log(JSON.stringify(summary, null, 2));
        return;
      }
      console.log(`${chalk.bold(file)}: ${bytes.length} bytes, valid`);
      for (const line of formatSummary(summary)) console.log(line);
    } catch (e) {
      console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
      process.exit(1);
    }
  });

program
  .command("run <file>")
  .description("Run an exported function to completion and print its results")
  .option("-f, --function <name>", "Export to call (default: wasmscope.json entry, then main)")
  .option("-a, --args <args...>", "Arguments, parsed by parameter type")
  .action(async (file: string, opts: Record<string, unknown>) => {
    try {
      const { result } = await loadOrExit(file);
      const { project, config } = await projectSettings(file);
      const entry = typeof opts.function === "string" ? opts.function : project.entry ?? "main";
      const rawArgs = Array.isArray(opts.args) ? opts.args.map(String) : [];
      const session = openSession(result, config, entry, rawArgs);

      const event = session.runToCompletion();
      if (event.reason === "finished") {
        for (const v of event.results ?? []) console.log(formatValue(v));
        return;
      }
      printStop(session, event);
      exitFor(event);
    } catch (e) {
      console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
      process.exit(1);
    }
  });

program
  .command("debug <file>")
  .description("Run an exported function under the debugger, printing state at every stop")
  .option("-f, --function <name>", "Export to call (default: wasmscope.json entry, then main)")
  .option("-a, --args <args...>", "Arguments, parsed by parameter type")
  .option("-b, --break <spec...>", "Breakpoints as function[:instruction][ if condition]")
  .option("-w, --watch <expr...>", "Expressions to evaluate at every stop")
  .option("--step <n>", "Single-step this many instructions after each stop", "0")
  .option("--step-mode <mode>", "Step granularity: instruction, over, into or out", "instruction")
  .option("--debug-start", "Debug the start function instead of an export")
  .action(async (file: string, opts: Record<string, unknown>) => {
    try {
      const { result } = await loadOrExit(file);
      const { project, config } = await projectSettings(file);
      const entry = typeof opts.function === "string" ? opts.function : project.entry ?? "main";
      const rawArgs = Array.isArray(opts.args) ? opts.args.map(String) : [];
      const session = openSession(result, config, entry, rawArgs, opts.debugStart === true);

      const specs = Array.isArray(opts.break) ? opts.break.map(String) : project.breakpoints ?? [];
      for (const text of specs) {
        const spec = parseBreakpointSpec(text);
        const bp = session.setBreakpoint(spec.func, spec.instrIndex, { condition: spec.condition });
        console.log(chalk.gray(`breakpoint #${bp.id} at ${session.functionName(bp.funcIndex)}:${bp.instrIndex}`));
      }
      for (const expr of Array.isArray(opts.watch) ? opts.watch.map(String) : []) session.watch(expr);

      const steps = Number(opts.step);
      if (!Number.isInteger(steps) || steps < 0) throw new Error(`--step must be a non-negative integer, got '${String(opts.step)}'`);
      const mode = String(opts.stepMode);
      if (!isStepGranularity(mode)) throw new Error(`unknown step mode '${mode}'`);

      process.once("SIGINT", () => {
        if (session.pause()) console.error(chalk.gray("pausing..."));
      });

      let event = await session.run();
      for (;;) {
        printStop(session, event);
        if (event.state !== "suspended") break;
        for (let i = 0; i < steps && event.state === "suspended"; i++) {
          event = await session.step(mode);
          printStop(session, event);
        }
        if (event.state !== "suspended") break;
        event = await session.run();
      }
      exitFor(event);
    } catch (e) {
      console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
      process.exit(1);
    }
  });

program.parse();
