// Builds module binaries for tests from instruction lines such as
// "local.get 0", "i32.const -1", "i32.load offset=4" or "block i32".

import { ByteWriter } from "../../src/binary/encoder.js";
import type { ValueType } from "../../src/binary/module.js";
import { naturalAlignment, opcodeByName, PREFIX_MISC } from "../../src/binary/opcodes.js";
import { f32ToBits, f64ToBits } from "../../src/binary/reader.js";

const TYPE_BYTES: Record<ValueType, number> = {
  i32: 0x7f, i64: 0x7e, f32: 0x7d, f64: 0x7c, funcref: 0x70, externref: 0x6f,
};

function typeByte(text: string): number {
  switch (text) {
    case "i32": case "i64": case "f32": case "f64": case "funcref": case "externref":
      return TYPE_BYTES[text];
    case "func": return TYPE_BYTES.funcref;
    case "extern": return TYPE_BYTES.externref;
    default: throw new Error(`unknown type '${text}'`);
  }
}

function num(text: string | undefined, fallback?: number): number {
  if (text === undefined) {
    if (fallback === undefined) throw new Error("missing immediate");
    return fallback;
  }
  return Number(text);
}

export function encodeInstruction(w: ByteWriter, line: string): void {
  const [name, ...imm] = line.trim().split(/\s+/);
  if (name === "select" && imm.length > 0) {
    w.u8(0x1c).vec(imm, (w, t) => w.u8(typeByte(t)));
    return;
  }
  const info = opcodeByName(name);
  if (!info) throw new Error(`unknown instruction '${name}'`);
  if (info.prefix === PREFIX_MISC) w.u8(PREFIX_MISC).u32(info.code);
  else w.u8(info.code);

  switch (info.class) {
    case "block": {
      const t = imm[0];
      if (t === undefined) w.u8(0x40);
      else if (/^\d+$/.test(t)) w.s33(Number(t));
      else w.u8(typeByte(t));
      break;
    }
    case "br": case "call": case "variable": case "elem_drop": case "data_drop": case "ref_func":
      w.u32(num(imm[0]));
      break;
    case "br_table": {
      const depths = imm.map(Number);
      const fallback = depths.pop();
      w.vec(depths, (w, d) => w.u32(d)).u32(num(fallback === undefined ? undefined : String(fallback)));
      break;
    }
    case "call_indirect":
      w.u32(num(imm[0])).u32(num(imm[1], 0));
      break;
    case "table":
      w.u32(num(imm[0], 0));
      break;
    case "table_copy":
      w.u32(num(imm[0], 0)).u32(num(imm[1], 0));
      break;
    case "table_init":
      w.u32(num(imm[0])).u32(num(imm[1], 0));
      break;
    case "memory": {
      let align = naturalAlignment(info);
      let offset = 0;
      for (const part of imm) {
        const [key, value] = part.split("=");
        if (key === "offset") offset = Number(value);
        else if (key === "align") align = Math.log2(Number(value));
      }
      w.u32(align).u32(offset);
      break;
    }
    case "memory_size": case "memory_fill":
      w.u8(0);
      break;
    case "memory_init":
      w.u32(num(imm[0])).u8(0);
      break;
    case "memory_copy":
      w.u8(0).u8(0);
      break;
    case "const": {
      const text = imm[0];
      if (text === undefined) throw new Error(`${name} needs a value`);
      if (name === "i32.const") w.s32(Number(text));
      else if (name === "i64.const") w.s64(BigInt(text));
      else if (name === "f32.const") w.f32Bits(nanBits(text, 0x7f800000n, 32n) ?? f32ToBits(Number(text)));
      else w.f64Bits(nanBits(text, 0x7ff0000000000000n, 64n) ?? f64ToBits(Number(text)));
      break;
    }
    case "ref_null":
      w.u8(typeByte(imm[0] ?? "func"));
      break;
    default:
      break;
  }
}

/** Bits of a `nan:0x<payload>` or `-nan:0x<payload>` literal. */
function nanBits(text: string, exponent: bigint, width: bigint): bigint | undefined {
  const match = /^(-?)nan:0x([0-9a-f]+)$/i.exec(text);
  if (!match) return undefined;
  const sign = match[1] === "-" ? 1n << (width - 1n) : 0n;
  return sign | exponent | BigInt(`0x${match[2]}`);
}

export interface FuncDef {
  name?: string;
  export?: string;
  params?: ValueType[];
  results?: ValueType[];
  locals?: ValueType[];
  /** Names for parameters and locals, by local index. */
  localNames?: string[];
  /** Instruction lines; the closing `end` is added. */
  body: string[];
}

export type ImportDef =
  | { module: string; name: string; kind: "func"; params?: ValueType[]; results?: ValueType[] }
  | { module: string; name: string; kind: "memory"; min: number; max?: number }
  | { module: string; name: string; kind: "table"; min: number; max?: number }
  | { module: string; name: string; kind: "global"; type: ValueType; mutable?: boolean };

export interface GlobalDef {
  type: ValueType;
  mutable?: boolean;
  /** A single constant instruction, e.g. "i32.const 7". */
  init: string;
  export?: string;
  /** Emitted in the name section's global names. */
  name?: string;
}

export interface ModuleDef {
  /** Signatures placed first in the type section, so tests know their indices. */
  types?: { params?: ValueType[]; results?: ValueType[] }[];
  imports?: ImportDef[];
  functions?: FuncDef[];
  table?: { min: number; max?: number; export?: string };
  memory?: { min: number; max?: number; export?: string };
  globals?: GlobalDef[];
  start?: number;
  /** Active segments on table 0, holding function indices. */
  elements?: { offset: number; funcs: number[] }[];
  /** Segments on memory 0; passive when no offset is given. */
  datas?: { offset?: number; bytes: number[] }[];
  /** Emit a data count section (needed by memory.init and data.drop). */
  dataCount?: boolean;
}

function limits(w: ByteWriter, min: number, max: number | undefined): void {
  if (max === undefined) w.u8(0).u32(min);
  else w.u8(1).u32(min).u32(max);
}

function section(out: ByteWriter, id: number, body: ByteWriter): void {
  out.u8(id).u32(body.length).bytes(body.toBytes());
}

function constExpr(w: ByteWriter, line: string): void {
  encodeInstruction(w, line);
  w.u8(0x0b);
}

/** Assemble a module binary. Function indices count imported functions first. */
export function buildModule(def: ModuleDef): Uint8Array {
  const signatures: string[] = [];
  const typeIndex = (params: ValueType[] = [], results: ValueType[] = []): number => {
    const key = `${params.join(",")}:${results.join(",")}`;
    const found = signatures.indexOf(key);
    if (found >= 0) return found;
    signatures.push(key);
    return signatures.length - 1;
  };
  for (const t of def.types ?? []) {
    const key = `${(t.params ?? []).join(",")}:${(t.results ?? []).join(",")}`;
    signatures.push(key);
  }
  const imports = def.imports ?? [];
  const functions = def.functions ?? [];
  const importTypes = imports.map(i => (i.kind === "func" ? typeIndex(i.params, i.results) : -1));
  const funcTypes = functions.map(f => typeIndex(f.params, f.results));
  const importedFuncs = imports.filter(i => i.kind === "func").length;
  const importedGlobals = imports.filter(i => i.kind === "global").length;

  const out = new ByteWriter().bytes([0x00, 0x61, 0x73, 0x6d, 0x01, 0x00, 0x00, 0x00]);

  section(out, 1, new ByteWriter().vec(signatures, (w, key) => {
    const [params, results] = key.split(":").map(s => s.split(",").filter(t => t.length > 0));
    w.u8(0x60).vec(params, (w, t) => w.u8(typeByte(t))).vec(results, (w, t) => w.u8(typeByte(t)));
  }));

  if (imports.length > 0) {
    section(out, 2, new ByteWriter().vec(imports.map((imp, i) => ({ imp, type: importTypes[i] })), (w, { imp, type }) => {
      w.name(imp.module).name(imp.name);
      switch (imp.kind) {
        case "func": w.u8(0).u32(type); break;
        case "table": w.u8(1).u8(TYPE_BYTES.funcref); limits(w, imp.min, imp.max); break;
        case "memory": w.u8(2); limits(w, imp.min, imp.max); break;
        case "global": w.u8(3).u8(TYPE_BYTES[imp.type]).u8(imp.mutable ? 1 : 0); break;
      }
    }));
  }

  if (functions.length > 0) section(out, 3, new ByteWriter().vec(funcTypes, (w, t) => w.u32(t)));

  if (def.table) {
    const { min, max } = def.table;
    section(out, 4, new ByteWriter().vec([def.table], w => {
      w.u8(TYPE_BYTES.funcref);
      limits(w, min, max);
    }));
  }
  if (def.memory) {
    const { min, max } = def.memory;
    section(out, 5, new ByteWriter().vec([def.memory], w => limits(w, min, max)));
  }
  if (def.globals && def.globals.length > 0) {
    section(out, 6, new ByteWriter().vec(def.globals, (w, g) => {
      w.u8(TYPE_BYTES[g.type]).u8(g.mutable ? 1 : 0);
      constExpr(w, g.init);
    }));
  }

  const exports: { name: string; kind: number; index: number }[] = [];
  functions.forEach((f, i) => {
    if (f.export !== undefined) exports.push({ name: f.export, kind: 0, index: importedFuncs + i });
  });
  if (def.table?.export !== undefined) exports.push({ name: def.table.export, kind: 1, index: 0 });
  if (def.memory?.export !== undefined) exports.push({ name: def.memory.export, kind: 2, index: 0 });
  (def.globals ?? []).forEach((g, i) => {
    if (g.export !== undefined) exports.push({ name: g.export, kind: 3, index: importedGlobals + i });
  });
  if (exports.length > 0) {
    section(out, 7, new ByteWriter().vec(exports, (w, e) => w.name(e.name).u8(e.kind).u32(e.index)));
  }

  if (def.start !== undefined) section(out, 8, new ByteWriter().u32(def.start));

  if (def.elements && def.elements.length > 0) {
    section(out, 9, new ByteWriter().vec(def.elements, (w, seg) => {
      w.u32(0);
      constExpr(w, `i32.const ${seg.offset}`);
      w.vec(seg.funcs, (w, f) => w.u32(f));
    }));
  }

  if (def.dataCount) section(out, 12, new ByteWriter().u32(def.datas?.length ?? 0));

  if (functions.length > 0) {
    section(out, 10, new ByteWriter().vec(functions, (w, f) => {
      const body = new ByteWriter();
      body.vec(f.locals ?? [], (b, t) => b.u32(1).u8(TYPE_BYTES[t]));
      for (const line of f.body) encodeInstruction(body, line);
      body.u8(0x0b);
      w.u32(body.length).bytes(body.toBytes());
    }));
  }

  if (def.datas && def.datas.length > 0) {
    section(out, 11, new ByteWriter().vec(def.datas, (w, seg) => {
      if (seg.offset === undefined) {
        w.u32(1);
      } else {
        w.u32(0);
        constExpr(w, `i32.const ${seg.offset}`);
      }
      w.u32(seg.bytes.length).bytes(seg.bytes);
    }));
  }

  const named = functions.map((f, i) => ({ f, index: importedFuncs + i }));
  const funcNames = named.filter(({ f }) => f.name !== undefined);
  const localNames = named.filter(({ f }) => f.localNames !== undefined);
  const globalNames = (def.globals ?? []).map((g, i) => ({ g, index: importedGlobals + i })).filter(({ g }) => g.name !== undefined);
  if (funcNames.length > 0 || localNames.length > 0 || globalNames.length > 0) {
    const names = new ByteWriter().name("name");
    if (funcNames.length > 0) {
      const sub = new ByteWriter().vec(funcNames, (w, { f, index }) => w.u32(index).name(f.name ?? ""));
      names.u8(1).u32(sub.length).bytes(sub.toBytes());
    }
    if (localNames.length > 0) {
      const sub = new ByteWriter().vec(localNames, (w, { f, index }) => {
        const locals = (f.localNames ?? []).map((name, i) => ({ name, i }));
        w.u32(index).vec(locals, (w, { name, i }) => w.u32(i).name(name));
      });
      names.u8(2).u32(sub.length).bytes(sub.toBytes());
    }
    if (globalNames.length > 0) {
      const sub = new ByteWriter().vec(globalNames, (w, { g, index }) => w.u32(index).name(g.name ?? ""));
      names.u8(7).u32(sub.length).bytes(sub.toBytes());
    }
    section(out, 0, names);
  }

  return out.toBytes();
}
