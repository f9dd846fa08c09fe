import {
  funcTypesEqual, funcTypeToString, functionName,
  type ConstExpr, type ExternKind, type FuncType, type FunctionBody, type Limits, type Module,
} from "../binary/module.js";
import { Trap, InstantiationError } from "../errors/errors.js";
import type { HostFunction } from "../host/bridge.js";
import type { FunctionMetadata, ValidatedModule } from "../validator/metadata.js";
import { GlobalInstance } from "./global.js";
import { MemoryInstance } from "./memory.js";
import { TableInstance } from "./table.js";
import { asI32, externref, f32OfBits, f64OfBits, funcref, i32, i64, type Value } from "./values.js";

export type FunctionInstance =
  | {
    kind: "wasm";
    /** Display name (name section, export name or `func[N]`). */
    name: string;
    type: FuncType;
    instance: Instance;
    /** Index in the owning module's function index space. */
    funcIndex: number;
    body: FunctionBody;
    meta: FunctionMetadata;
  }
  | { kind: "host"; name: string; type: FuncType; host: HostFunction };

export type ExternValue =
  | { kind: "func"; value: FunctionInstance }
  | { kind: "table"; value: TableInstance }
  | { kind: "memory"; value: MemoryInstance }
  | { kind: "global"; value: GlobalInstance };

/** Looks up the value bound to an import. */
export interface ImportResolver {
  resolve(module: string, name: string): ExternValue | undefined;
}

export interface InstantiateOptions {
  /** Memory size ceiling in pages for memories this instance defines. */
  maxMemoryPages?: number;
}

/**
 * A live realization of a validated module. Owns its memories, tables and
 * globals, except the ones it imported, which it shares with their owner.
 */
export class Instance {
  readonly module: Module;
  readonly validated: ValidatedModule;
  readonly functions: FunctionInstance[] = [];
  readonly tables: TableInstance[] = [];
  readonly memories: MemoryInstance[] = [];
  readonly globals: GlobalInstance[] = [];
  /** Element segment contents; a dropped segment is empty. */
  readonly elements: Value[][] = [];
  /** Data segment contents; a dropped segment is empty. */
  readonly datas: Uint8Array[] = [];
  readonly exports = new Map<string, ExternValue>();

  constructor(validated: ValidatedModule) {
    this.validated = validated;
    this.module = validated.module;
  }

  getExport(name: string): ExternValue | undefined {
    return this.exports.get(name);
  }

  exportedFunction(name: string): FunctionInstance | undefined {
    const ext = this.exports.get(name);
    return ext?.kind === "func" ? ext.value : undefined;
  }

  dropElement(index: number): void {
    this.elements[index] = [];
  }

  dropData(index: number): void {
    this.datas[index] = new Uint8Array(0);
  }
}

// ------------------------------------------------------------
// Import matching
// ------------------------------------------------------------

function limitsMatch(actual: Limits, actualSize: number, expected: Limits): boolean {
  if (actualSize < expected.min) return false;
  if (expected.max === undefined) return true;
  return actual.max !== undefined && actual.max <= expected.max;
}

function describeKind(kind: ExternKind): string {
  return kind === "func" ? "function" : kind;
}

function incompatible(module: string, name: string, detail: string): InstantiationError {
  return new InstantiationError(`incompatible import type for ${module}.${name}: ${detail}`);
}

function bindImports(instance: Instance, resolver: ImportResolver): void {
  const { module } = instance;
  for (const imp of module.imports) {
    const ext = resolver.resolve(imp.module, imp.name);
    if (!ext) throw new InstantiationError(`unknown import: ${imp.module}.${imp.name}`);
    if (ext.kind !== imp.desc.kind) {
      throw incompatible(imp.module, imp.name, `expected ${describeKind(imp.desc.kind)}, found ${describeKind(ext.kind)}`);
    }
    switch (imp.desc.kind) {
      case "func": {
        if (ext.kind !== "func") break;
        const expected = module.types[imp.desc.typeIndex];
        if (!funcTypesEqual(ext.value.type, expected)) {
          throw incompatible(imp.module, imp.name,
            `expected ${funcTypeToString(expected)}, found ${funcTypeToString(ext.value.type)}`);
        }
        instance.functions.push(ext.value);
        break;
      }
      case "table": {
        if (ext.kind !== "table") break;
        const expected = imp.desc.type;
        if (ext.value.type.elemType !== expected.elemType) {
          throw incompatible(imp.module, imp.name, `expected ${expected.elemType} table, found ${ext.value.type.elemType}`);
        }
        if (!limitsMatch(ext.value.type.limits, ext.value.size, expected.limits)) {
          throw incompatible(imp.module, imp.name, "table limits do not match");
        }
        instance.tables.push(ext.value);
        break;
      }
      case "memory": {
        if (ext.kind !== "memory") break;
        if (!limitsMatch(ext.value.type.limits, ext.value.pages, imp.desc.type.limits)) {
          throw incompatible(imp.module, imp.name, "memory limits do not match");
        }
        instance.memories.push(ext.value);
        break;
      }
      case "global": {
        if (ext.kind !== "global") break;
        const expected = imp.desc.type;
        const actual = ext.value.type;
        if (actual.valueType !== expected.valueType || actual.mutable !== expected.mutable) {
          throw incompatible(imp.module, imp.name,
            `expected ${expected.mutable ? "mut " : ""}${expected.valueType}, found ${actual.mutable ? "mut " : ""}${actual.valueType}`);
        }
        instance.globals.push(ext.value);
        break;
      }
    }
  }
}

// ------------------------------------------------------------
// Constant expressions
// ------------------------------------------------------------

/** Evaluate a validated constant expression in the context of a partially built instance. */
export function evalConst(expr: ConstExpr, instance: Instance): Value {
  const instr = expr[0];
  switch (instr?.kind) {
    case "const":
      switch (instr.type) {
        case "i32": return i32(instr.value);
        case "i64": return i64(instr.value);
        case "f32": return f32OfBits(Number(instr.bits));
        case "f64": return f64OfBits(instr.bits);
      }
      break;
    case "ref_null":
      return instr.type === "funcref" ? funcref(null) : externref(null);
    case "ref_func": {
      const fn = instance.functions[instr.funcIndex];
      if (fn) return funcref(fn);
      break;
    }
    case "variable": {
      const g = instance.globals[instr.index];
      if (instr.op === "global.get" && g) return g.value;
      break;
    }
    default:
      break;
  }
  throw new InstantiationError("constant expression required");
}

// ------------------------------------------------------------
// Instantiation
// ------------------------------------------------------------

export interface Instantiated {
  instance: Instance;
  /** The start function, still to be run by the caller. */
  start?: FunctionInstance;
}

/**
 * Allocate an instance: bind imports, create functions, tables, memories and
 * globals, fill exports, and apply active segments. Running the start
 * function is left to the caller, which owns an interpreter.
 */
export function instantiate(
  validated: ValidatedModule,
  resolver: ImportResolver,
  options: InstantiateOptions = {},
): Instantiated {
  const instance = new Instance(validated);
  const { module } = instance;
  bindImports(instance, resolver);

  const imported = instance.functions.length;
  module.functions.forEach((body, i) => {
    const funcIndex = imported + i;
    const meta = validated.functions[i];
    instance.functions.push({
      kind: "wasm",
      name: functionName(module, funcIndex),
      type: module.types[body.typeIndex],
      instance,
      funcIndex,
      body,
      meta,
    });
  });

  for (const type of module.tables) instance.tables.push(new TableInstance(type));
  for (const type of module.memories) instance.memories.push(new MemoryInstance(type, options.maxMemoryPages));
  for (const g of module.globals) instance.globals.push(new GlobalInstance(g.type, evalConst(g.init, instance)));

  for (const e of module.exports) {
    switch (e.kind) {
      case "func": instance.exports.set(e.name, { kind: "func", value: instance.functions[e.index] }); break;
      case "table": instance.exports.set(e.name, { kind: "table", value: instance.tables[e.index] }); break;
      case "memory": instance.exports.set(e.name, { kind: "memory", value: instance.memories[e.index] }); break;
      case "global": instance.exports.set(e.name, { kind: "global", value: instance.globals[e.index] }); break;
    }
  }

  for (const seg of module.elements) instance.elements.push(seg.init.map(item => evalConst(item, instance)));
  for (const seg of module.datas) instance.datas.push(seg.data);

  try {
    module.elements.forEach((seg, i) => {
      if (seg.mode.kind === "active") {
        const table = instance.tables[seg.mode.index];
        const offset = asI32(evalConst(seg.mode.offset, instance)) >>> 0;
        const items = instance.elements[i];
        table.initFrom(items, offset, 0, items.length);
      }
      if (seg.mode.kind !== "passive") instance.dropElement(i);
    });
    module.datas.forEach((seg, i) => {
      if (seg.mode.kind !== "active") return;
      const memory = instance.memories[seg.mode.index];
      const offset = asI32(evalConst(seg.mode.offset, instance)) >>> 0;
      memory.write(offset, seg.data);
      instance.dropData(i);
    });
  } catch (e) {
    if (e instanceof Trap) throw new InstantiationError(`segment initialization failed: ${e.message}`, e);
    throw e;
  }

  const start = module.start === undefined ? undefined : instance.functions[module.start];
  return { instance, start };
}
