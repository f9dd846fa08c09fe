import { ByteReader, f32FromBits, f64FromBits } from "./reader.js";
import {
  isMemoryOp, isNumericOp, lookupMiscOpcode, lookupOpcode, PREFIX_MISC, type OpcodeInfo,
} from "./opcodes.js";
import {
  emptyModule,
  type BlockType, type ConstExpr, type DataSegment, type ElementSegment, type Export,
  type ExternKind, type FuncType, type FunctionBody, type Global, type GlobalType,
  type Import, type Instruction, type Limits, type Module, type NameSection, type RefType,
  type TableType, type ValueType,
} from "./module.js";
import { DecodeError } from "../errors/errors.js";
import { warning, type Diagnostic } from "../errors/diagnostic.js";

export const WASM_MAGIC = [0x00, 0x61, 0x73, 0x6d];
export const WASM_VERSION = [0x01, 0x00, 0x00, 0x00];

export const SectionId = {
  Custom: 0,
  Type: 1,
  Import: 2,
  Function: 3,
  Table: 4,
  Memory: 5,
  Global: 6,
  Export: 7,
  Start: 8,
  Element: 9,
  Code: 10,
  Data: 11,
  DataCount: 12,
} as const;

// Position of each section id in the mandated order (data count sits between element and code).
const SECTION_RANK: Record<number, number> = {
  1: 1, 2: 2, 3: 3, 4: 4, 5: 5, 6: 6, 7: 7, 8: 8, 9: 9, 12: 10, 10: 11, 11: 12,
};

const VALUE_TYPE_CODES: Record<number, ValueType> = {
  0x7f: "i32",
  0x7e: "i64",
  0x7d: "f32",
  0x7c: "f64",
  0x70: "funcref",
  0x6f: "externref",
};

const EXTERN_KINDS: ExternKind[] = ["func", "table", "memory", "global"];

export interface DecodeResult {
  module: Module;
  /** Non-fatal findings, e.g. a malformed name section that was skipped. */
  warnings: Diagnostic[];
}

export class Decoder {
  private bytes: Uint8Array;
  private source: string;
  private module: Module = emptyModule();
  private warnings: Diagnostic[] = [];
  private functionTypeIndices: number[] = [];

  constructor(bytes: Uint8Array, source: string = "<module>") {
    this.bytes = bytes;
    this.source = source;
  }

  decode(): DecodeResult {
    const reader = new ByteReader(this.bytes);
    this.readHeader(reader);

    let lastRank = 0;
    let lastId = 0;
    while (!reader.isAtEnd()) {
      const idOffset = reader.pos;
      const id = reader.readU8();
      const size = reader.readU32();
      const body = reader.sub(size);

      if (id === SectionId.Custom) {
        this.readCustomSection(body, lastId);
        continue;
      }

      const rank = SECTION_RANK[id];
      if (rank === undefined) reader.fail("malformed section id", idOffset);
      if (rank <= lastRank) {
        reader.fail(rank === lastRank ? "duplicate section" : "section out of order", idOffset);
      }
      lastRank = rank;
      lastId = id;
      this.module.sectionOrder.push(id);

      this.readSection(id, body);
      if (!body.isAtEnd()) body.fail("section size mismatch");
    }

    if (this.functionTypeIndices.length !== this.module.functions.length) {
      throw new DecodeError("function and code section have inconsistent lengths", this.bytes.length);
    }
    if (this.module.dataCount !== undefined && this.module.dataCount !== this.module.datas.length) {
      throw new DecodeError("data count and data section have inconsistent lengths", this.bytes.length);
    }

    return { module: this.module, warnings: this.warnings };
  }

  private readHeader(reader: ByteReader): void {
    for (const expected of WASM_MAGIC) {
      if (reader.isAtEnd() || reader.readU8() !== expected) reader.fail("magic header not detected", 0);
    }
    for (const expected of WASM_VERSION) {
      if (reader.isAtEnd() || reader.readU8() !== expected) reader.fail("unknown binary version", 4);
    }
  }

  private readSection(id: number, r: ByteReader): void {
    const m = this.module;
    switch (id) {
      case SectionId.Type:
        m.types = r.readVec(() => this.readFuncType(r));
        break;
      case SectionId.Import:
        m.imports = r.readVec(() => this.readImport(r));
        break;
      case SectionId.Function:
        this.functionTypeIndices = r.readVec(() => r.readU32());
        break;
      case SectionId.Table:
        m.tables = r.readVec(() => this.readTableType(r));
        break;
      case SectionId.Memory:
        m.memories = r.readVec(() => ({ limits: this.readLimits(r) }));
        break;
      case SectionId.Global:
        m.globals = r.readVec(() => this.readGlobal(r));
        break;
      case SectionId.Export:
        m.exports = r.readVec(() => this.readExport(r));
        break;
      case SectionId.Start:
        m.start = r.readU32();
        break;
      case SectionId.Element:
        m.elements = r.readVec(() => this.readElement(r));
        break;
      case SectionId.DataCount:
        m.dataCount = r.readU32();
        break;
      case SectionId.Code: {
        const bodies = r.readVec((_, i) => this.readCode(r, i));
        if (bodies.length !== this.functionTypeIndices.length) {
          r.fail("function and code section have inconsistent lengths");
        }
        m.functions = bodies;
        break;
      }
      case SectionId.Data:
        m.datas = r.readVec(() => this.readData(r));
        break;
    }
  }

  // ============================================================
  // Types
  // ============================================================

  private readValueType(r: ByteReader): ValueType {
    const at = r.pos;
    const type = VALUE_TYPE_CODES[r.readU8()];
    if (type === undefined) r.fail("malformed value type", at);
    return type;
  }

  private readRefType(r: ByteReader): RefType {
    const at = r.pos;
    const code = r.readU8();
    if (code === 0x70) return "funcref";
    if (code === 0x6f) return "externref";
    return r.fail("malformed reference type", at);
  }

  private readFuncType(r: ByteReader): FuncType {
    const at = r.pos;
    if (r.readU8() !== 0x60) r.fail("integer representation too long", at);
    const params = r.readVec(() => this.readValueType(r));
    const results = r.readVec(() => this.readValueType(r));
    return { params, results };
  }

  private readLimits(r: ByteReader): Limits {
    const at = r.pos;
    const flag = r.readU8();
    if (flag === 0x00) return { min: r.readU32() };
    if (flag === 0x01) {
      const min = r.readU32();
      return { min, max: r.readU32() };
    }
    return r.fail("integer too large", at);
  }

  private readTableType(r: ByteReader): TableType {
    const elemType = this.readRefType(r);
    return { elemType, limits: this.readLimits(r) };
  }

  private readGlobalType(r: ByteReader): GlobalType {
    const valueType = this.readValueType(r);
    const at = r.pos;
    const mut = r.readU8();
    if (mut > 1) r.fail("malformed mutability", at);
    return { valueType, mutable: mut === 1 };
  }

  // ============================================================
  // Sections
  // ============================================================

  private readImport(r: ByteReader): Import {
    const module = r.readName();
    const name = r.readName();
    const at = r.pos;
    const kind = r.readU8();
    switch (kind) {
      case 0x00: return { module, name, desc: { kind: "func", typeIndex: r.readU32() } };
      case 0x01: return { module, name, desc: { kind: "table", type: this.readTableType(r) } };
      case 0x02: return { module, name, desc: { kind: "memory", type: { limits: this.readLimits(r) } } };
      case 0x03: return { module, name, desc: { kind: "global", type: this.readGlobalType(r) } };
      default: return r.fail("malformed import kind", at);
    }
  }

  private readGlobal(r: ByteReader): Global {
    const type = this.readGlobalType(r);
    return { type, init: this.readConstExpr(r) };
  }

  private readExport(r: ByteReader): Export {
    const name = r.readName();
    const at = r.pos;
    const kind = EXTERN_KINDS[r.readU8()];
    if (kind === undefined) r.fail("malformed export kind", at);
    return { name, kind, index: r.readU32() };
  }

  private readElemKind(r: ByteReader): RefType {
    const at = r.pos;
    if (r.readU8() !== 0x00) r.fail("malformed element kind", at);
    return "funcref";
  }

  private readFuncIndexItems(r: ByteReader): ConstExpr[] {
    return r.readVec(() => {
      const offset = r.pos;
      const funcIndex = r.readU32();
      const item: Instruction[] = [{ kind: "ref_func", funcIndex, offset }];
      return item;
    });
  }

  private readElement(r: ByteReader): ElementSegment {
    const at = r.pos;
    const flags = r.readU32();
    switch (flags) {
      case 0: {
        const offset = this.readConstExpr(r);
        return { type: "funcref", init: this.readFuncIndexItems(r), mode: { kind: "active", index: 0, offset }, flags };
      }
      case 1: {
        const type = this.readElemKind(r);
        return { type, init: this.readFuncIndexItems(r), mode: { kind: "passive" }, flags };
      }
      case 2: {
        const index = r.readU32();
        const offset = this.readConstExpr(r);
        const type = this.readElemKind(r);
        return { type, init: this.readFuncIndexItems(r), mode: { kind: "active", index, offset }, flags };
      }
      case 3: {
        const type = this.readElemKind(r);
        return { type, init: this.readFuncIndexItems(r), mode: { kind: "declarative" }, flags };
      }
      case 4: {
        const offset = this.readConstExpr(r);
        const init = r.readVec(() => this.readConstExpr(r));
        return { type: "funcref", init, mode: { kind: "active", index: 0, offset }, flags };
      }
      case 5: {
        const type = this.readRefType(r);
        return { type, init: r.readVec(() => this.readConstExpr(r)), mode: { kind: "passive" }, flags };
      }
      case 6: {
        const index = r.readU32();
        const offset = this.readConstExpr(r);
        const type = this.readRefType(r);
        return { type, init: r.readVec(() => this.readConstExpr(r)), mode: { kind: "active", index, offset }, flags };
      }
      case 7: {
        const type = this.readRefType(r);
        return { type, init: r.readVec(() => this.readConstExpr(r)), mode: { kind: "declarative" }, flags };
      }
      default:
        return r.fail("malformed elements segment kind", at);
    }
  }

  private readData(r: ByteReader): DataSegment {
    const at = r.pos;
    const flags = r.readU32();
    switch (flags) {
      case 0: {
        const offset = this.readConstExpr(r);
        return { data: r.readBytes(r.readU32()), mode: { kind: "active", index: 0, offset }, flags };
      }
      case 1:
        return { data: r.readBytes(r.readU32()), mode: { kind: "passive" }, flags };
      case 2: {
        const index = r.readU32();
        const offset = this.readConstExpr(r);
        return { data: r.readBytes(r.readU32()), mode: { kind: "active", index, offset }, flags };
      }
      default:
        return r.fail("malformed data segment kind", at);
    }
  }

  private readCode(r: ByteReader, index: number): FunctionBody {
    const entryOffset = r.pos;
    const size = r.readU32();
    const body = r.sub(size);

    const locals: ValueType[] = [];
    const groups = body.readVec(() => {
      const count = body.readU32();
      return { count, type: this.readValueType(body) };
    });
    let total = 0;
    for (const group of groups) {
      total += group.count;
      if (total > 0xffffffff) body.fail("too many locals");
    }
    // Declared counts are trusted only once the total is known to be sane.
    if (total > 50_000) body.fail("too many locals");
    for (const group of groups) {
      for (let i = 0; i < group.count; i++) locals.push(group.type);
    }

    const instructions = this.readInstructions(body, false);
    if (!body.isAtEnd()) body.fail("section size mismatch");

    const typeIndex = this.functionTypeIndices[index];
    if (typeIndex === undefined) r.fail("function and code section have inconsistent lengths", entryOffset);
    return { typeIndex, locals, body: instructions, offset: entryOffset };
  }

  // ============================================================
  // Instructions
  // ============================================================

  private readConstExpr(r: ByteReader): ConstExpr {
    const expr = this.readInstructions(r, true);
    // The trailing `end` is implicit in constant expressions.
    expr.pop();
    return expr;
  }

  /**
   * Read instructions up to and including the `end` that closes the outermost
   * level. For function bodies that final `end` is kept so every function has
   * an instruction at which its frame returns.
   */
  private readInstructions(r: ByteReader, constant: boolean): Instruction[] {
    const out: Instruction[] = [];
    let depth = 0;
    for (;;) {
      if (r.isAtEnd()) r.fail(constant ? "unexpected end" : "unexpected end of section or function");
      const instr = this.readInstruction(r);
      out.push(instr);
      if (instr.kind === "block") {
        depth++;
      } else if (instr.kind === "control" && instr.op === "end") {
        if (depth === 0) return out;
        depth--;
      }
    }
  }

  private readInstruction(r: ByteReader): Instruction {
    const offset = r.pos;
    const byte = r.readU8();
    let info: OpcodeInfo | undefined;
    if (byte === PREFIX_MISC) {
      const sub = r.readU32();
      info = lookupMiscOpcode(sub);
      if (!info) r.fail(`unknown opcode 0xfc 0x${sub.toString(16)}`, offset);
    } else {
      info = lookupOpcode(byte);
      if (!info) r.fail(`unknown opcode 0x${byte.toString(16).padStart(2, "0")}`, offset);
    }
    return this.readImmediates(r, info, offset);
  }

  private readImmediates(r: ByteReader, info: OpcodeInfo, offset: number): Instruction {
    const name = info.name;
    switch (info.class) {
      case "control":
        switch (name) {
          case "unreachable":
          case "nop":
          case "else":
          case "end":
          case "return":
            return { kind: "control", op: name, offset };
        }
        break;
      case "block":
        switch (name) {
          case "block":
          case "loop":
          case "if":
            return { kind: "block", op: name, blockType: this.readBlockType(r), offset };
        }
        break;
      case "br":
        if (name === "br" || name === "br_if") return { kind: "br", op: name, depth: r.readU32(), offset };
        break;
      case "br_table": {
        const depths = r.readVec(() => r.readU32());
        return { kind: "br_table", depths, defaultDepth: r.readU32(), offset };
      }
      case "call":
        return { kind: "call", funcIndex: r.readU32(), offset };
      case "call_indirect": {
        const typeIndex = r.readU32();
        return { kind: "call_indirect", typeIndex, tableIndex: r.readU32(), offset };
      }
      case "parametric":
        if (name === "drop" || name === "select") return { kind: "parametric", op: name, offset };
        break;
      case "parametric_typed":
        return { kind: "parametric", op: "select", types: r.readVec(() => this.readValueType(r)), offset };
      case "variable":
        switch (name) {
          case "local.get":
          case "local.set":
          case "local.tee":
          case "global.get":
          case "global.set":
            return { kind: "variable", op: name, index: r.readU32(), offset };
        }
        break;
      case "table":
        switch (name) {
          case "table.get":
          case "table.set":
          case "table.size":
          case "table.grow":
          case "table.fill":
            return { kind: "table", op: name, tableIndex: r.readU32(), offset };
        }
        break;
      case "table_copy": {
        const dstTable = r.readU32();
        return { kind: "table_copy", dstTable, srcTable: r.readU32(), offset };
      }
      case "table_init": {
        const elemIndex = r.readU32();
        return { kind: "table_init", elemIndex, tableIndex: r.readU32(), offset };
      }
      case "elem_drop":
        return { kind: "elem_drop", elemIndex: r.readU32(), offset };
      case "memory":
        if (isMemoryOp(name)) {
          const align = r.readU32();
          return { kind: "memory", op: name, memArg: { align, offset: r.readU32() }, offset };
        }
        break;
      case "memory_size":
        if (name === "memory.size" || name === "memory.grow") {
          return { kind: "memory_size", op: name, memIndex: this.readZeroByte(r), offset };
        }
        break;
      case "memory_init": {
        const dataIndex = r.readU32();
        return { kind: "memory_init", dataIndex, memIndex: this.readZeroByte(r), offset };
      }
      case "data_drop":
        return { kind: "data_drop", dataIndex: r.readU32(), offset };
      case "memory_copy": {
        const dstMem = this.readZeroByte(r);
        return { kind: "memory_copy", dstMem, srcMem: this.readZeroByte(r), offset };
      }
      case "memory_fill":
        return { kind: "memory_fill", memIndex: this.readZeroByte(r), offset };
      case "const":
        switch (name) {
          case "i32.const": return { kind: "const", type: "i32", value: r.readS32(), offset };
          case "i64.const": return { kind: "const", type: "i64", value: r.readS64(), offset };
          case "f32.const": {
            const bits = r.readF32Bits();
            return { kind: "const", type: "f32", value: f32FromBits(bits), bits, offset };
          }
          case "f64.const": {
            const bits = r.readF64Bits();
            return { kind: "const", type: "f64", value: f64FromBits(bits), bits, offset };
          }
        }
        break;
      case "numeric":
        if (isNumericOp(name)) return { kind: "numeric", op: name, offset };
        break;
      case "ref_null":
        return { kind: "ref_null", type: this.readRefType(r), offset };
      case "ref_is_null":
        return { kind: "ref_is_null", offset };
      case "ref_func":
        return { kind: "ref_func", funcIndex: r.readU32(), offset };
    }
    throw new Error(`opcode table entry '${name}' does not match its class '${info.class}'`);
  }

  private readBlockType(r: ByteReader): BlockType {
    const at = r.pos;
    const byte = r.peekU8();
    if (byte === 0x40) {
      r.readU8();
      return { kind: "empty" };
    }
    const valueType = VALUE_TYPE_CODES[byte];
    if (valueType !== undefined) {
      r.readU8();
      return { kind: "value", type: valueType };
    }
    const typeIndex = r.readS33();
    if (typeIndex < 0) r.fail("malformed block type", at);
    return { kind: "index", typeIndex };
  }

  private readZeroByte(r: ByteReader): number {
    const at = r.pos;
    if (r.readU8() !== 0x00) r.fail("zero byte expected", at);
    return 0;
  }

  // ============================================================
  // Custom sections
  // ============================================================

  private readCustomSection(r: ByteReader, after: number): void {
    const name = r.readName();
    const data = r.readBytes(r.remaining);
    this.module.customs.push({ name, data, after });
    if (name !== "name") return;
    try {
      this.module.names = readNameSection(data);
    } catch (e) {
      // A broken name section must not make the module unloadable.
      if (!(e instanceof DecodeError)) throw e;
      this.warnings.push(warning(`ignoring malformed name section: ${e.reason}`, { offset: e.offset, source: this.source }));
    }
  }
}

export function readNameSection(data: Uint8Array): NameSection {
  const names: NameSection = { functions: new Map(), locals: new Map(), globals: new Map() };
  const r = new ByteReader(data);
  while (!r.isAtEnd()) {
    const id = r.readU8();
    const sub = r.sub(r.readU32());
    switch (id) {
      case 0:
        names.module = sub.readName();
        break;
      case 1:
        for (const [index, name] of sub.readVec(() => [sub.readU32(), sub.readName()] as const)) {
          names.functions.set(index, name);
        }
        break;
      case 2:
        sub.readVec(() => {
          const funcIndex = sub.readU32();
          const locals = new Map<number, string>();
          for (const [index, name] of sub.readVec(() => [sub.readU32(), sub.readName()] as const)) {
            locals.set(index, name);
          }
          names.locals.set(funcIndex, locals);
        });
        break;
      case 7:
        for (const [index, name] of sub.readVec(() => [sub.readU32(), sub.readName()] as const)) {
          names.globals.set(index, name);
        }
        break;
      default:
        // Extended name subsections (labels, types, ...) are not used.
        sub.pos = sub.end;
    }
  }
  return names;
}

/** Decode a binary module. Throws {@link DecodeError} on malformed input. */
export function decodeModule(bytes: Uint8Array, source?: string): DecodeResult {
  return new Decoder(bytes, source).decode();
}
