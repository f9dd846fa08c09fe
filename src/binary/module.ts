// In-memory representation of a decoded WebAssembly module.
//
// Everything here is plain data: the decoder produces it, the encoder consumes
// it and the validator annotates it without mutating it.

import type { MemoryOp, NumericOp } from "./opcodes.js";

export type { MemoryOp, NumericOp };

export type NumType = "i32" | "i64" | "f32" | "f64";
export type RefType = "funcref" | "externref";
export type ValueType = NumType | RefType;

export interface FuncType {
  params: ValueType[];
  results: ValueType[];
}

export interface Limits {
  min: number;
  max?: number;
}

export interface TableType {
  elemType: RefType;
  limits: Limits;
}

export interface MemoryType {
  limits: Limits;
}

export interface GlobalType {
  valueType: ValueType;
  mutable: boolean;
}

export type ExternKind = "func" | "table" | "memory" | "global";

export type ImportDesc =
  | { kind: "func"; typeIndex: number }
  | { kind: "table"; type: TableType }
  | { kind: "memory"; type: MemoryType }
  | { kind: "global"; type: GlobalType };

export interface Import {
  module: string;
  name: string;
  desc: ImportDesc;
}

export interface Export {
  name: string;
  kind: ExternKind;
  index: number;
}

/** `[]` for no result, one value type, or a type index for multi-value blocks. */
export type BlockType =
  | { kind: "empty" }
  | { kind: "value"; type: ValueType }
  | { kind: "index"; typeIndex: number };

export interface MemArg {
  align: number;
  offset: number;
}

interface At {
  /** Byte offset of the opcode in the module binary. */
  offset: number;
}

export type ControlOp = "unreachable" | "nop" | "else" | "end" | "return";

/**
 * One variant per instruction class. The interpreter and validator dispatch on
 * `kind` and then on `op` within the class.
 */
export type Instruction = At & (
  | { kind: "control"; op: ControlOp }
  | { kind: "block"; op: "block" | "loop" | "if"; blockType: BlockType }
  | { kind: "br"; op: "br" | "br_if"; depth: number }
  | { kind: "br_table"; depths: number[]; defaultDepth: number }
  | { kind: "call"; funcIndex: number }
  | { kind: "call_indirect"; typeIndex: number; tableIndex: number }
  | { kind: "parametric"; op: "drop" | "select"; types?: ValueType[] }
  | { kind: "variable"; op: "local.get" | "local.set" | "local.tee" | "global.get" | "global.set"; index: number }
  | { kind: "table"; op: "table.get" | "table.set" | "table.size" | "table.grow" | "table.fill"; tableIndex: number }
  | { kind: "table_copy"; dstTable: number; srcTable: number }
  | { kind: "table_init"; tableIndex: number; elemIndex: number }
  | { kind: "elem_drop"; elemIndex: number }
  | { kind: "memory"; op: MemoryOp; memArg: MemArg }
  | { kind: "memory_size"; op: "memory.size" | "memory.grow"; memIndex: number }
  | { kind: "memory_init"; dataIndex: number; memIndex: number }
  | { kind: "data_drop"; dataIndex: number }
  | { kind: "memory_copy"; dstMem: number; srcMem: number }
  | { kind: "memory_fill"; memIndex: number }
  | { kind: "const"; type: "i32"; value: number }
  | { kind: "const"; type: "i64"; value: bigint }
  | { kind: "const"; type: "f32" | "f64"; value: number; bits: bigint }
  | { kind: "numeric"; op: NumericOp }
  | { kind: "ref_null"; type: RefType }
  | { kind: "ref_is_null" }
  | { kind: "ref_func"; funcIndex: number }
);

/** A constant expression, e.g. a global initializer or a segment offset. */
export type ConstExpr = Instruction[];

export interface Global {
  type: GlobalType;
  init: ConstExpr;
}

export interface FunctionBody {
  typeIndex: number;
  /** Declared locals only (parameters excluded), already expanded from run-length groups. */
  locals: ValueType[];
  body: Instruction[];
  /** Offset of the code entry in the module binary. */
  offset: number;
}

export type SegmentMode =
  | { kind: "passive" }
  | { kind: "declarative" }
  | { kind: "active"; index: number; offset: ConstExpr };

export interface ElementSegment {
  type: RefType;
  /** Each item is a constant expression (`ref.func`, `ref.null`, `global.get`). */
  init: ConstExpr[];
  mode: SegmentMode;
  /** Encoding flag 0-7, kept so the encoder reproduces the input form. */
  flags: number;
}

export interface DataSegment {
  data: Uint8Array;
  mode: SegmentMode;
  /** 0: active on memory 0, 1: passive, 2: active with explicit memory index. */
  flags: number;
}

export interface CustomSection {
  name: string;
  data: Uint8Array;
  /** Id of the last non-custom section that precedes it (0 when at the start). */
  after: number;
}

export interface NameSection {
  module?: string;
  functions: Map<number, string>;
  locals: Map<number, Map<number, string>>;
  globals: Map<number, string>;
}

export interface Module {
  types: FuncType[];
  imports: Import[];
  functions: FunctionBody[];
  tables: TableType[];
  memories: MemoryType[];
  globals: Global[];
  exports: Export[];
  start?: number;
  elements: ElementSegment[];
  datas: DataSegment[];
  dataCount?: number;
  customs: CustomSection[];
  names: NameSection;
  /** Ids of the non-custom sections in the order they appeared. */
  sectionOrder: number[];
}

export function emptyModule(): Module {
  return {
    types: [],
    imports: [],
    functions: [],
    tables: [],
    memories: [],
    globals: [],
    exports: [],
    elements: [],
    datas: [],
    customs: [],
    names: { functions: new Map(), locals: new Map(), globals: new Map() },
    sectionOrder: [],
  };
}

export function importedCount(module: Module, kind: ExternKind): number {
  return module.imports.filter(i => i.desc.kind === kind).length;
}

/** Type of a function in the module's function index space (imports first). */
export function funcTypeOf(module: Module, funcIndex: number): FuncType | undefined {
  let seen = 0;
  for (const imp of module.imports) {
    if (imp.desc.kind !== "func") continue;
    if (seen === funcIndex) return module.types[imp.desc.typeIndex];
    seen++;
  }
  const fn = module.functions[funcIndex - seen];
  return fn ? module.types[fn.typeIndex] : undefined;
}

export function globalTypes(module: Module): GlobalType[] {
  const out: GlobalType[] = [];
  for (const imp of module.imports) {
    if (imp.desc.kind === "global") out.push(imp.desc.type);
  }
  for (const g of module.globals) out.push(g.type);
  return out;
}

export function tableTypes(module: Module): TableType[] {
  const out: TableType[] = [];
  for (const imp of module.imports) {
    if (imp.desc.kind === "table") out.push(imp.desc.type);
  }
  return out.concat(module.tables);
}

export function memoryTypes(module: Module): MemoryType[] {
  const out: MemoryType[] = [];
  for (const imp of module.imports) {
    if (imp.desc.kind === "memory") out.push(imp.desc.type);
  }
  return out.concat(module.memories);
}

export function blockSignature(module: Module, blockType: BlockType): FuncType | undefined {
  switch (blockType.kind) {
    case "empty": return { params: [], results: [] };
    case "value": return { params: [], results: [blockType.type] };
    case "index": return module.types[blockType.typeIndex];
  }
}

export function funcTypesEqual(a: FuncType, b: FuncType): boolean {
  return a.params.length === b.params.length
    && a.results.length === b.results.length
    && a.params.every((t, i) => t === b.params[i])
    && a.results.every((t, i) => t === b.results[i]);
}

export function funcTypeToString(type: FuncType): string {
  return `[${type.params.join(" ")}] -> [${type.results.join(" ")}]`;
}

/** Human-readable name for a function index, from the name section when present. */
export function functionName(module: Module, funcIndex: number): string {
  const named = module.names.functions.get(funcIndex);
  if (named !== undefined) return `$${named}`;
  let seen = 0;
  for (const imp of module.imports) {
    if (imp.desc.kind !== "func") continue;
    if (seen === funcIndex) return `${imp.module}.${imp.name}`;
    seen++;
  }
  const exported = module.exports.find(e => e.kind === "func" && e.index === funcIndex);
  return exported ? exported.name : `func[${funcIndex}]`;
}
