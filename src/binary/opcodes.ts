import table from "./opcodes.json" with { type: "json" };
import type { FuncType, ValueType } from "./module.js";

export const PREFIX_MISC = 0xfc;

const CLASSES = [
  "control", "block", "br", "br_table", "call", "call_indirect",
  "parametric", "parametric_typed", "variable", "table", "table_copy", "table_init", "elem_drop",
  "memory", "memory_size", "memory_init", "data_drop", "memory_copy", "memory_fill",
  "const", "numeric", "ref_null", "ref_is_null", "ref_func",
] as const;

export type OpcodeClass = typeof CLASSES[number];

/** Loads and stores, the instructions that carry a memarg. */
const MEMORY_OPS = [
  "i32.load", "i64.load", "f32.load", "f64.load", "i32.load8_s", "i32.load8_u", "i32.load16_s",
  "i32.load16_u", "i64.load8_s", "i64.load8_u", "i64.load16_s", "i64.load16_u", "i64.load32_s",
  "i64.load32_u", "i32.store", "i64.store", "f32.store", "f64.store", "i32.store8", "i32.store16",
  "i64.store8", "i64.store16", "i64.store32",
] as const;

export type MemoryOp = typeof MEMORY_OPS[number];

/** Stack-only arithmetic, comparison and conversion instructions. */
const NUMERIC_OPS = [
  "i32.eqz", "i32.eq", "i32.ne", "i32.lt_s", "i32.lt_u", "i32.gt_s", "i32.gt_u", "i32.le_s", "i32.le_u",
  "i32.ge_s", "i32.ge_u", "i64.eqz", "i64.eq", "i64.ne", "i64.lt_s", "i64.lt_u", "i64.gt_s", "i64.gt_u",
  "i64.le_s", "i64.le_u", "i64.ge_s", "i64.ge_u", "f32.eq", "f32.ne", "f32.lt", "f32.gt", "f32.le", "f32.ge",
  "f64.eq", "f64.ne", "f64.lt", "f64.gt", "f64.le", "f64.ge", "i32.clz", "i32.ctz", "i32.popcnt", "i32.add",
  "i32.sub", "i32.mul", "i32.div_s", "i32.div_u", "i32.rem_s", "i32.rem_u", "i32.and", "i32.or", "i32.xor",
  "i32.shl", "i32.shr_s", "i32.shr_u", "i32.rotl", "i32.rotr", "i64.clz", "i64.ctz", "i64.popcnt", "i64.add",
  "i64.sub", "i64.mul", "i64.div_s", "i64.div_u", "i64.rem_s", "i64.rem_u", "i64.and", "i64.or", "i64.xor",
  "i64.shl", "i64.shr_s", "i64.shr_u", "i64.rotl", "i64.rotr", "f32.abs", "f32.neg", "f32.ceil", "f32.floor",
  "f32.trunc", "f32.nearest", "f32.sqrt", "f32.add", "f32.sub", "f32.mul", "f32.div", "f32.min", "f32.max",
  "f32.copysign", "f64.abs", "f64.neg", "f64.ceil", "f64.floor", "f64.trunc", "f64.nearest", "f64.sqrt",
  "f64.add", "f64.sub", "f64.mul", "f64.div", "f64.min", "f64.max", "f64.copysign", "i32.wrap_i64",
  "i32.trunc_f32_s", "i32.trunc_f32_u", "i32.trunc_f64_s", "i32.trunc_f64_u", "i64.extend_i32_s",
  "i64.extend_i32_u", "i64.trunc_f32_s", "i64.trunc_f32_u", "i64.trunc_f64_s", "i64.trunc_f64_u",
  "f32.convert_i32_s", "f32.convert_i32_u", "f32.convert_i64_s", "f32.convert_i64_u", "f32.demote_f64",
  "f64.convert_i32_s", "f64.convert_i32_u", "f64.convert_i64_s", "f64.convert_i64_u", "f64.promote_f32",
  "i32.reinterpret_f32", "i64.reinterpret_f64", "f32.reinterpret_i32", "f64.reinterpret_i64",
  "i32.extend8_s", "i32.extend16_s", "i64.extend8_s", "i64.extend16_s", "i64.extend32_s",
  "i32.trunc_sat_f32_s", "i32.trunc_sat_f32_u", "i32.trunc_sat_f64_s", "i32.trunc_sat_f64_u",
  "i64.trunc_sat_f32_s", "i64.trunc_sat_f32_u", "i64.trunc_sat_f64_s", "i64.trunc_sat_f64_u",
] as const;

export type NumericOp = typeof NUMERIC_OPS[number];

export interface OpcodeInfo {
  code: number;
  /** 0xfc for the prefixed (misc) space; absent for single-byte opcodes. */
  prefix?: number;
  name: string;
  class: OpcodeClass;
  /** Fixed stack effect, present for instructions whose typing needs no context. */
  signature?: FuncType;
  /** Access width in bytes for loads and stores. */
  size?: number;
}

interface RawOpcode {
  code: string;
  name: string;
  class: string;
  sig?: string;
  size?: number;
}

const VALUE_TYPES: ReadonlySet<string> = new Set(["i32", "i64", "f32", "f64", "funcref", "externref"]);

function isValueType(s: string): s is ValueType {
  return VALUE_TYPES.has(s);
}

function isOpcodeClass(s: string): s is OpcodeClass {
  return (CLASSES as readonly string[]).includes(s);
}

const MEMORY_OP_SET: ReadonlySet<string> = new Set<string>(MEMORY_OPS);
const NUMERIC_OP_SET: ReadonlySet<string> = new Set<string>(NUMERIC_OPS);

export function isMemoryOp(s: string): s is MemoryOp {
  return MEMORY_OP_SET.has(s);
}

export function isNumericOp(s: string): s is NumericOp {
  return NUMERIC_OP_SET.has(s);
}

function parseTypes(list: string, name: string): ValueType[] {
  return list.split(" ").filter(t => t.length > 0).map(t => {
    if (!isValueType(t)) throw new Error(`opcode table: bad type '${t}' in ${name}`);
    return t;
  });
}

/** Parse a signature such as `"i32 i32 -> i32"`. */
export function parseSignature(sig: string, name = "<signature>"): FuncType {
  const [params, results] = sig.split("->");
  if (results === undefined) throw new Error(`opcode table: bad signature '${sig}' for ${name}`);
  return { params: parseTypes(params.trim(), name), results: parseTypes(results.trim(), name) };
}

function toInfo(raw: RawOpcode): OpcodeInfo {
  if (!isOpcodeClass(raw.class)) {
    throw new Error(`opcode table: unknown class '${raw.class}' for ${raw.name}`);
  }
  if ((raw.class === "memory" && !isMemoryOp(raw.name)) || (raw.class === "numeric" && !isNumericOp(raw.name))) {
    throw new Error(`opcode table: unknown ${raw.class} instruction '${raw.name}'`);
  }
  const bytes = raw.code.split(" ").map(b => parseInt(b, 16));
  const info: OpcodeInfo = bytes.length === 2
    ? { code: bytes[1], prefix: bytes[0], name: raw.name, class: raw.class }
    : { code: bytes[0], name: raw.name, class: raw.class };
  if (raw.sig !== undefined) info.signature = parseSignature(raw.sig, raw.name);
  if (raw.size !== undefined) info.size = raw.size;
  return info;
}

const rawTable: readonly RawOpcode[] = table;

export const OPCODES: readonly OpcodeInfo[] = rawTable.map(toInfo);

const SINGLE = new Map<number, OpcodeInfo>();
const MISC = new Map<number, OpcodeInfo>();
const BY_NAME = new Map<string, OpcodeInfo>();

for (const info of OPCODES) {
  if (info.prefix === PREFIX_MISC) MISC.set(info.code, info);
  else SINGLE.set(info.code, info);
  // `select` has an untyped (0x1b) and a typed (0x1c) encoding; the name maps to the first.
  if (!BY_NAME.has(info.name)) BY_NAME.set(info.name, info);
}

export function lookupOpcode(code: number): OpcodeInfo | undefined {
  return SINGLE.get(code);
}

export function lookupMiscOpcode(code: number): OpcodeInfo | undefined {
  return MISC.get(code);
}

export function opcodeByName(name: string): OpcodeInfo | undefined {
  return BY_NAME.get(name);
}

/** Natural alignment exponent for a load/store (log2 of the access width). */
export function naturalAlignment(info: OpcodeInfo): number {
  return Math.log2(info.size ?? 1);
}
