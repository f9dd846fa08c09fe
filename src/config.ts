import { readFile } from "node:fs/promises";
import * as path from "node:path";

export interface EngineConfig {
  /** Frames on the call stack before a call traps with "call stack exhausted". */
  maxCallDepth: number;
  /** Operand stack slots (all frames together) before a push traps. */
  maxValueStack: number;
  /** Ceiling on any memory's size in pages, on top of its declared maximum. */
  maxMemoryPages: number;
  /** Instructions executed by `run()`/`step()` between yields to the event loop. */
  sliceSize: number;
  /** Compare the operand stack with the validator's snapshot at every boundary. */
  verifyStack: boolean;
}

export const DEFAULT_CONFIG: Readonly<EngineConfig> = {
  maxCallDepth: 1024,
  maxValueStack: 1 << 20,
  maxMemoryPages: 65536,
  sliceSize: 10_000,
  verifyStack: false,
};

// ---------------------------------------------------------------------------
// Environment overrides
// ---------------------------------------------------------------------------
//   WASMSCOPE_MAX_CALL_DEPTH  maximum call depth
//   WASMSCOPE_MAX_STACK       maximum operand stack size
//   WASMSCOPE_SLICE_SIZE      instructions per run slice
//   WASMSCOPE_VERIFY_STACK    "1" or "true" to check stacks against validation

function positiveInt(raw: string | undefined, name: string): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) throw new Error(`${name} must be a positive integer, got '${raw}'`);
  return n;
}

function flag(raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  return raw === "1" || raw.toLowerCase() === "true";
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<EngineConfig> {
  const out: Partial<EngineConfig> = {};
  const depth = positiveInt(env.WASMSCOPE_MAX_CALL_DEPTH, "WASMSCOPE_MAX_CALL_DEPTH");
  const stack = positiveInt(env.WASMSCOPE_MAX_STACK, "WASMSCOPE_MAX_STACK");
  const slice = positiveInt(env.WASMSCOPE_SLICE_SIZE, "WASMSCOPE_SLICE_SIZE");
  const verify = flag(env.WASMSCOPE_VERIFY_STACK);
  if (depth !== undefined) out.maxCallDepth = depth;
  if (stack !== undefined) out.maxValueStack = stack;
  if (slice !== undefined) out.sliceSize = slice;
  if (verify !== undefined) out.verifyStack = verify;
  return out;
}

/** Defaults, then each override in order; later overrides win. */
export function resolveConfig(...overrides: Partial<EngineConfig>[]): EngineConfig {
  const config: EngineConfig = { ...DEFAULT_CONFIG };
  for (const o of overrides) {
    for (const [key, value] of Object.entries(o)) {
      if (value !== undefined && key in config) Object.assign(config, { [key]: value });
    }
  }
  return config;
}

/** Shape of `wasmscope.json`, looked up next to the module being loaded. */
export interface ProjectConfig {
  engine?: Partial<EngineConfig>;
  /** Default export to invoke when none is given on the command line. */
  entry?: string;
  /** Breakpoints as `function:instruction`, applied by `debug`. */
  breakpoints?: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseProjectConfig(raw: unknown, file: string): ProjectConfig {
  if (!isRecord(raw)) throw new Error(`${file}: expected a JSON object`);
  const out: ProjectConfig = {};
  if (isRecord(raw.engine)) {
    const engine: Partial<EngineConfig> = {};
    for (const key of ["maxCallDepth", "maxValueStack", "maxMemoryPages", "sliceSize"] as const) {
      const v = raw.engine[key];
      if (v === undefined) continue;
      if (typeof v !== "number" || !Number.isInteger(v) || v <= 0) throw new Error(`${file}: engine.${key} must be a positive integer`);
      engine[key] = v;
    }
    if (typeof raw.engine.verifyStack === "boolean") engine.verifyStack = raw.engine.verifyStack;
    out.engine = engine;
  }
  if (typeof raw.entry === "string") out.entry = raw.entry;
  if (Array.isArray(raw.breakpoints)) out.breakpoints = raw.breakpoints.filter((b): b is string => typeof b === "string");
  return out;
}

export async function loadProjectConfig(moduleFile: string): Promise<ProjectConfig> {
  const dir = path.dirname(path.resolve(moduleFile));
  const file = path.join(dir, "wasmscope.json");
  let raw: string;
  try {
    raw = await readFile(file, "utf-8");
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return {};
    throw e;
  }
  return parseProjectConfig(JSON.parse(raw), file);
}
