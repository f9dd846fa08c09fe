import { opcodeByName, PREFIX_MISC } from "./opcodes.js";
import { instructionName } from "./print.js";
import { SectionId, WASM_MAGIC, WASM_VERSION } from "./decoder.js";
import type {
  BlockType, ConstExpr, FuncType, GlobalType, Instruction, Limits, Module, RefType, ValueType,
} from "./module.js";

const VALUE_TYPE_BYTES: Record<ValueType, number> = {
  i32: 0x7f,
  i64: 0x7e,
  f32: 0x7d,
  f64: 0x7c,
  funcref: 0x70,
  externref: 0x6f,
};

const EXTERN_KIND_BYTES = { func: 0, table: 1, memory: 2, global: 3 } as const;

const CANONICAL_ORDER = [
  SectionId.Type, SectionId.Import, SectionId.Function, SectionId.Table, SectionId.Memory,
  SectionId.Global, SectionId.Export, SectionId.Start, SectionId.Element, SectionId.DataCount,
  SectionId.Code, SectionId.Data,
];

const utf8 = new TextEncoder();

/** Growable byte buffer with the binary format's primitive encodings. */
export class ByteWriter {
  private chunks: number[] = [];

  get length(): number {
    return this.chunks.length;
  }

  u8(byte: number): this {
    this.chunks.push(byte & 0xff);
    return this;
  }

  bytes(data: ArrayLike<number>): this {
    for (let i = 0; i < data.length; i++) this.chunks.push(data[i]);
    return this;
  }

  u32(value: number): this {
    let v = value >>> 0;
    do {
      let byte = v & 0x7f;
      v >>>= 7;
      if (v !== 0) byte |= 0x80;
      this.chunks.push(byte);
    } while (v !== 0);
    return this;
  }

  s32(value: number): this {
    return this.signed(BigInt(value | 0));
  }

  s33(value: number): this {
    return this.signed(BigInt(value));
  }

  s64(value: bigint): this {
    return this.signed(BigInt.asIntN(64, value));
  }

  private signed(value: bigint): this {
    let v = value;
    for (;;) {
      const byte = Number(v & 0x7fn);
      v >>= 7n;
      const done = (v === 0n && (byte & 0x40) === 0) || (v === -1n && (byte & 0x40) !== 0);
      this.chunks.push(done ? byte : byte | 0x80);
      if (done) return this;
    }
  }

  f32Bits(bits: bigint): this {
    const n = Number(bits & 0xffffffffn);
    return this.u8(n).u8(n >>> 8).u8(n >>> 16).u8(n >>> 24);
  }

  f64Bits(bits: bigint): this {
    for (let i = 0n; i < 8n; i++) this.u8(Number((bits >> (8n * i)) & 0xffn));
    return this;
  }

  name(text: string): this {
    const encoded = utf8.encode(text);
    return this.u32(encoded.length).bytes(encoded);
  }

  vec<T>(items: readonly T[], write: (w: this, item: T) => void): this {
    this.u32(items.length);
    for (const item of items) write(this, item);
    return this;
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.chunks);
  }
}

export class Encoder {
  private module: Module;

  constructor(module: Module) {
    this.module = module;
  }

  encode(): Uint8Array {
    const out = new ByteWriter().bytes(WASM_MAGIC).bytes(WASM_VERSION);
    this.writeCustoms(out, 0);
    for (const id of CANONICAL_ORDER) {
      if (!this.hasSection(id)) continue;
      const body = new ByteWriter();
      this.writeSection(id, body);
      out.u8(id).u32(body.length).bytes(body.toBytes());
      this.writeCustoms(out, id);
    }
    return out.toBytes();
  }

  private hasSection(id: number): boolean {
    const m = this.module;
    if (m.sectionOrder.includes(id)) return true;
    switch (id) {
      case SectionId.Type: return m.types.length > 0;
      case SectionId.Import: return m.imports.length > 0;
      case SectionId.Function:
      case SectionId.Code: return m.functions.length > 0;
      case SectionId.Table: return m.tables.length > 0;
      case SectionId.Memory: return m.memories.length > 0;
      case SectionId.Global: return m.globals.length > 0;
      case SectionId.Export: return m.exports.length > 0;
      case SectionId.Start: return m.start !== undefined;
      case SectionId.Element: return m.elements.length > 0;
      case SectionId.DataCount: return m.dataCount !== undefined;
      case SectionId.Data: return m.datas.length > 0;
      default: return false;
    }
  }

  private writeCustoms(out: ByteWriter, after: number): void {
    for (const custom of this.module.customs) {
      if (custom.after !== after) continue;
      const body = new ByteWriter().name(custom.name).bytes(custom.data);
      out.u8(SectionId.Custom).u32(body.length).bytes(body.toBytes());
    }
  }

  private writeSection(id: number, w: ByteWriter): void {
    const m = this.module;
    switch (id) {
      case SectionId.Type:
        w.vec(m.types, (w, t) => writeFuncType(w, t));
        break;
      case SectionId.Import:
        w.vec(m.imports, (w, imp) => {
          w.name(imp.module).name(imp.name).u8(EXTERN_KIND_BYTES[imp.desc.kind]);
          switch (imp.desc.kind) {
            case "func": w.u32(imp.desc.typeIndex); break;
            case "table": writeRefType(w, imp.desc.type.elemType); writeLimits(w, imp.desc.type.limits); break;
            case "memory": writeLimits(w, imp.desc.type.limits); break;
            case "global": writeGlobalType(w, imp.desc.type); break;
          }
        });
        break;
      case SectionId.Function:
        w.vec(m.functions, (w, f) => w.u32(f.typeIndex));
        break;
      case SectionId.Table:
        w.vec(m.tables, (w, t) => {
          writeRefType(w, t.elemType);
          writeLimits(w, t.limits);
        });
        break;
      case SectionId.Memory:
        w.vec(m.memories, (w, mem) => writeLimits(w, mem.limits));
        break;
      case SectionId.Global:
        w.vec(m.globals, (w, g) => {
          writeGlobalType(w, g.type);
          writeExpr(w, g.init);
        });
        break;
      case SectionId.Export:
        w.vec(m.exports, (w, e) => w.name(e.name).u8(EXTERN_KIND_BYTES[e.kind]).u32(e.index));
        break;
      case SectionId.Start:
        w.u32(m.start ?? 0);
        break;
      case SectionId.Element:
        w.vec(m.elements, (w, seg) => this.writeElement(w, seg));
        break;
      case SectionId.DataCount:
        w.u32(m.dataCount ?? m.datas.length);
        break;
      case SectionId.Code:
        w.vec(m.functions, (w, f) => {
          const body = new ByteWriter();
          body.vec(groupLocals(f.locals), (b, g) => {
            b.u32(g.count).u8(VALUE_TYPE_BYTES[g.type]);
          });
          for (const instr of f.body) writeInstruction(body, instr);
          w.u32(body.length).bytes(body.toBytes());
        });
        break;
      case SectionId.Data:
        w.vec(m.datas, (w, seg) => {
          w.u32(seg.flags);
          if (seg.mode.kind === "active") {
            if (seg.flags === 2) w.u32(seg.mode.index);
            writeExpr(w, seg.mode.offset);
          }
          w.u32(seg.data.length).bytes(seg.data);
        });
        break;
    }
  }

  private writeElement(w: ByteWriter, seg: Module["elements"][number]): void {
    w.u32(seg.flags);
    const usesIndices = seg.flags < 4;
    if (seg.mode.kind === "active") {
      if (seg.flags === 2 || seg.flags === 6) w.u32(seg.mode.index);
      writeExpr(w, seg.mode.offset);
    }
    // Flags 0 and 4 imply funcref; the others spell out the element kind or type.
    if (seg.flags !== 0 && seg.flags !== 4) {
      if (usesIndices) w.u8(0x00);
      else writeRefType(w, seg.type);
    }
    if (usesIndices) {
      w.vec(seg.init, (w, item) => {
        const first = item[0];
        if (item.length !== 1 || first.kind !== "ref_func") {
          throw new Error(`element segment with flags ${seg.flags} can only hold function indices`);
        }
        w.u32(first.funcIndex);
      });
    } else {
      w.vec(seg.init, (w, item) => writeExpr(w, item));
    }
  }
}

function writeFuncType(w: ByteWriter, type: FuncType): void {
  w.u8(0x60);
  w.vec(type.params, (w, t) => w.u8(VALUE_TYPE_BYTES[t]));
  w.vec(type.results, (w, t) => w.u8(VALUE_TYPE_BYTES[t]));
}

function writeRefType(w: ByteWriter, type: RefType): void {
  w.u8(VALUE_TYPE_BYTES[type]);
}

function writeLimits(w: ByteWriter, limits: Limits): void {
  if (limits.max === undefined) w.u8(0x00).u32(limits.min);
  else w.u8(0x01).u32(limits.min).u32(limits.max);
}

function writeGlobalType(w: ByteWriter, type: GlobalType): void {
  w.u8(VALUE_TYPE_BYTES[type.valueType]).u8(type.mutable ? 1 : 0);
}

function writeBlockType(w: ByteWriter, blockType: BlockType): void {
  switch (blockType.kind) {
    case "empty": w.u8(0x40); break;
    case "value": w.u8(VALUE_TYPE_BYTES[blockType.type]); break;
    case "index": w.s33(blockType.typeIndex); break;
  }
}

function writeExpr(w: ByteWriter, expr: ConstExpr): void {
  for (const instr of expr) writeInstruction(w, instr);
  w.u8(0x0b);
}

function groupLocals(locals: ValueType[]): { count: number; type: ValueType }[] {
  const groups: { count: number; type: ValueType }[] = [];
  for (const type of locals) {
    const last = groups[groups.length - 1];
    if (last && last.type === type) last.count++;
    else groups.push({ count: 1, type });
  }
  return groups;
}

export function writeInstruction(w: ByteWriter, instr: Instruction): void {
  const name = instructionName(instr);
  if (instr.kind === "parametric" && instr.types) {
    w.u8(0x1c).vec(instr.types, (w, t) => w.u8(VALUE_TYPE_BYTES[t]));
    return;
  }
  const info = opcodeByName(name);
  if (!info) throw new Error(`no opcode for instruction '${name}'`);
  if (info.prefix === PREFIX_MISC) w.u8(PREFIX_MISC).u32(info.code);
  else w.u8(info.code);

  switch (instr.kind) {
    case "block": writeBlockType(w, instr.blockType); break;
    case "br": w.u32(instr.depth); break;
    case "br_table": w.vec(instr.depths, (w, d) => w.u32(d)).u32(instr.defaultDepth); break;
    case "call": w.u32(instr.funcIndex); break;
    case "call_indirect": w.u32(instr.typeIndex).u32(instr.tableIndex); break;
    case "variable": w.u32(instr.index); break;
    case "table": w.u32(instr.tableIndex); break;
    case "table_copy": w.u32(instr.dstTable).u32(instr.srcTable); break;
    case "table_init": w.u32(instr.elemIndex).u32(instr.tableIndex); break;
    case "elem_drop": w.u32(instr.elemIndex); break;
    case "memory": w.u32(instr.memArg.align).u32(instr.memArg.offset); break;
    case "memory_size": w.u8(instr.memIndex); break;
    case "memory_init": w.u32(instr.dataIndex).u8(instr.memIndex); break;
    case "data_drop": w.u32(instr.dataIndex); break;
    case "memory_copy": w.u8(instr.dstMem).u8(instr.srcMem); break;
    case "memory_fill": w.u8(instr.memIndex); break;
    case "const":
      switch (instr.type) {
        case "i32": w.s32(instr.value); break;
        case "i64": w.s64(instr.value); break;
        case "f32": w.f32Bits(instr.bits); break;
        case "f64": w.f64Bits(instr.bits); break;
      }
      break;
    case "ref_null": writeRefType(w, instr.type); break;
    case "ref_func": w.u32(instr.funcIndex); break;
    default:
      break;
  }
}

/** Serialize a module back to the binary format. */
export function encodeModule(module: Module): Uint8Array {
  return new Encoder(module).encode();
}
