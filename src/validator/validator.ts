import {
  blockSignature, funcTypeOf, globalTypes, memoryTypes, tableTypes,
  type ConstExpr, type FuncType, type FunctionBody, type GlobalType, type Instruction,
  type Limits, type Module, type RefType, type TableType, type ValueType,
} from "../binary/module.js";
import { naturalAlignment, opcodeByName } from "../binary/opcodes.js";
import { ValidationError } from "../errors/errors.js";
import type { FunctionMetadata, StackSnapshot, StackType, ValidatedModule } from "./metadata.js";

export const MAX_MEMORY_PAGES = 65536;
const MAX_TABLE_SIZE = 0xffffffff;

interface ControlFrame {
  op: "block" | "loop" | "if" | "else" | "function";
  startTypes: ValueType[];
  endTypes: ValueType[];
  height: number;
  unreachable: boolean;
  /** Index of the instruction that opened the frame. */
  pc: number;
}

function isRef(t: StackType): boolean {
  return t === "funcref" || t === "externref";
}

function isNum(t: StackType): boolean {
  return t === "i32" || t === "i64" || t === "f32" || t === "f64";
}

/** Context shared by every function body of one module. */
interface ModuleContext {
  module: Module;
  globals: GlobalType[];
  tables: TableType[];
  memoryCount: number;
  funcCount: number;
  refs: Set<number>;
}

/**
 * Abstract interpretation of one function body over value types, following the
 * algorithm of the WebAssembly standard's validation appendix.
 */
class FunctionValidator {
  private opds: StackType[] = [];
  private ctrls: ControlFrame[] = [];
  private pc = 0;
  private meta: FunctionMetadata;

  constructor(
    private ctx: ModuleContext,
    private body: FunctionBody,
    funcIndex: number,
    type: FuncType,
  ) {
    this.meta = {
      funcIndex,
      type,
      locals: [...type.params, ...body.locals],
      stack: [],
      blockEnd: new Map(),
      elseAt: new Map(),
      maxHeight: 0,
    };
  }

  run(): FunctionMetadata {
    const { type } = this.meta;
    this.ctrls.push({ op: "function", startTypes: [], endTypes: type.results, height: 0, unreachable: false, pc: -1 });
    const instrs = this.body.body;
    for (this.pc = 0; this.pc < instrs.length; this.pc++) {
      if (this.ctrls.length === 0) this.fail("operators remaining after end of function", instrs[this.pc]);
      this.meta.stack.push(this.snapshot());
      this.check(instrs[this.pc]);
      this.meta.maxHeight = Math.max(this.meta.maxHeight, this.opds.length);
    }
    if (this.ctrls.length !== 0) {
      this.fail("unexpected end of section or function", instrs[instrs.length - 1]);
    }
    return this.meta;
  }

  private snapshot(): StackSnapshot {
    const top = this.ctrls[this.ctrls.length - 1];
    return { height: this.opds.length, types: this.opds.slice(), reachable: !top.unreachable };
  }

  private fail(reason: string, instr: Instruction | undefined): never {
    throw new ValidationError(reason, instr?.offset ?? this.body.offset, this.meta.funcIndex, this.pc);
  }

  private instr(): Instruction {
    return this.body.body[this.pc];
  }

  // ------------------------------------------------------------
  // Operand and control stacks
  // ------------------------------------------------------------

  private push(type: StackType): void {
    this.opds.push(type);
  }

  private pushAll(types: readonly ValueType[]): void {
    for (const t of types) this.push(t);
  }

  private popAny(): StackType {
    const top = this.ctrls[this.ctrls.length - 1];
    if (this.opds.length === top.height) {
      if (top.unreachable) return "unknown";
      this.fail("type mismatch", this.instr());
    }
    const value = this.opds.pop();
    if (value === undefined) return this.fail("type mismatch", this.instr());
    return value;
  }

  private pop(expected: StackType): StackType {
    const actual = this.popAny();
    if (actual !== expected && actual !== "unknown" && expected !== "unknown") {
      this.fail("type mismatch", this.instr());
    }
    return actual === "unknown" ? expected : actual;
  }

  private popAll(types: readonly ValueType[]): void {
    for (let i = types.length - 1; i >= 0; i--) this.pop(types[i]);
  }

  private pushCtrl(op: ControlFrame["op"], startTypes: ValueType[], endTypes: ValueType[]): void {
    this.ctrls.push({ op, startTypes, endTypes, height: this.opds.length, unreachable: false, pc: this.pc });
    this.pushAll(startTypes);
  }

  private popCtrl(): ControlFrame {
    const frame = this.ctrls[this.ctrls.length - 1];
    this.popAll(frame.endTypes);
    if (this.opds.length !== frame.height) this.fail("type mismatch", this.instr());
    this.ctrls.pop();
    return frame;
  }

  private labelTypes(frame: ControlFrame): ValueType[] {
    return frame.op === "loop" ? frame.startTypes : frame.endTypes;
  }

  private label(depth: number): ControlFrame {
    if (depth >= this.ctrls.length) this.fail("unknown label", this.instr());
    return this.ctrls[this.ctrls.length - 1 - depth];
  }

  private setUnreachable(): void {
    const top = this.ctrls[this.ctrls.length - 1];
    this.opds.length = top.height;
    top.unreachable = true;
  }

  // ------------------------------------------------------------
  // Index checks
  // ------------------------------------------------------------

  private local(index: number): ValueType {
    const type = this.meta.locals[index];
    if (type === undefined) this.fail("unknown local", this.instr());
    return type;
  }

  private global(index: number): GlobalType {
    const type = this.ctx.globals[index];
    if (type === undefined) this.fail("unknown global", this.instr());
    return type;
  }

  private table(index: number): TableType {
    const type = this.ctx.tables[index];
    if (type === undefined) this.fail("unknown table", this.instr());
    return type;
  }

  private memory(index: number): void {
    if (index >= this.ctx.memoryCount) this.fail(`unknown memory ${index}`, this.instr());
  }

  private funcType(index: number): FuncType {
    const type = funcTypeOf(this.ctx.module, index);
    if (type === undefined) this.fail("unknown function", this.instr());
    return type;
  }

  private typeAt(index: number): FuncType {
    const type = this.ctx.module.types[index];
    if (type === undefined) this.fail("unknown type", this.instr());
    return type;
  }

  private elem(index: number): RefType {
    const seg = this.ctx.module.elements[index];
    if (seg === undefined) this.fail("unknown elem segment", this.instr());
    return seg.type;
  }

  private data(index: number): void {
    const count = this.ctx.module.dataCount;
    if (count === undefined) this.fail("data count section required", this.instr());
    if (index >= count) this.fail("unknown data segment", this.instr());
  }

  // ------------------------------------------------------------
  // Instructions
  // ------------------------------------------------------------

  private check(instr: Instruction): void {
    switch (instr.kind) {
      case "control":
        switch (instr.op) {
          case "unreachable":
            this.setUnreachable();
            return;
          case "nop":
            return;
          case "else": {
            const frame = this.popCtrl();
            if (frame.op !== "if") this.fail("else without matching if", instr);
            this.meta.elseAt.set(frame.pc, this.pc);
            this.ctrls.push({ ...frame, op: "else", height: this.opds.length, unreachable: false });
            this.pushAll(frame.startTypes);
            return;
          }
          case "end": {
            const frame = this.popCtrl();
            // An `if` without `else` behaves as if the missing branch forwarded its parameters.
            if (frame.op === "if" && !typesMatch(frame.startTypes, frame.endTypes)) this.fail("type mismatch", instr);
            if (frame.op !== "function") this.meta.blockEnd.set(frame.pc, this.pc);
            this.pushAll(frame.endTypes);
            if (frame.op === "function") this.opds.length = 0;
            return;
          }
          case "return":
            this.popAll(this.meta.type.results);
            this.setUnreachable();
            return;
        }
        return;

      case "block": {
        if (instr.blockType.kind === "index") this.typeAt(instr.blockType.typeIndex);
        const sig = blockSignature(this.ctx.module, instr.blockType);
        if (sig === undefined) return this.fail("unknown type", instr);
        if (instr.op === "if") this.pop("i32");
        this.popAll(sig.params);
        this.pushCtrl(instr.op, sig.params, sig.results);
        return;
      }

      case "br": {
        const target = this.label(instr.depth);
        if (instr.op === "br_if") this.pop("i32");
        const types = this.labelTypes(target);
        this.popAll(types);
        if (instr.op === "br") this.setUnreachable();
        else this.pushAll(types);
        return;
      }

      case "br_table": {
        this.pop("i32");
        const arity = this.labelTypes(this.label(instr.defaultDepth)).length;
        for (const depth of instr.depths) {
          const types = this.labelTypes(this.label(depth));
          if (types.length !== arity) this.fail("type mismatch", instr);
          // Each target is checked against the operands without consuming them.
          const saved = this.opds.slice();
          this.popAll(types);
          this.opds = saved;
        }
        this.popAll(this.labelTypes(this.label(instr.defaultDepth)));
        this.setUnreachable();
        return;
      }

      case "call": {
        const type = this.funcType(instr.funcIndex);
        this.popAll(type.params);
        this.pushAll(type.results);
        return;
      }

      case "call_indirect": {
        const table = this.table(instr.tableIndex);
        if (table.elemType !== "funcref") this.fail("type mismatch", instr);
        const type = this.typeAt(instr.typeIndex);
        this.pop("i32");
        this.popAll(type.params);
        this.pushAll(type.results);
        return;
      }

      case "parametric":
        if (instr.op === "drop") {
          this.popAny();
          return;
        }
        if (instr.types) {
          if (instr.types.length !== 1) this.fail("invalid result arity", instr);
          const t = instr.types[0];
          this.pop("i32");
          this.pop(t);
          this.pop(t);
          this.push(t);
          return;
        }
        {
          this.pop("i32");
          const t1 = this.popAny();
          const t2 = this.popAny();
          if (!(isNum(t1) || t1 === "unknown") || !(isNum(t2) || t2 === "unknown")) this.fail("type mismatch", instr);
          if (t1 !== t2 && t1 !== "unknown" && t2 !== "unknown") this.fail("type mismatch", instr);
          this.push(t1 === "unknown" ? t2 : t1);
        }
        return;

      case "variable":
        switch (instr.op) {
          case "local.get":
            this.push(this.local(instr.index));
            return;
          case "local.set":
            this.pop(this.local(instr.index));
            return;
          case "local.tee": {
            const t = this.local(instr.index);
            this.pop(t);
            this.push(t);
            return;
          }
          case "global.get":
            this.push(this.global(instr.index).valueType);
            return;
          case "global.set": {
            const g = this.global(instr.index);
            if (!g.mutable) this.fail("global is immutable", instr);
            this.pop(g.valueType);
            return;
          }
        }
        return;

      case "table": {
        const t = this.table(instr.tableIndex).elemType;
        switch (instr.op) {
          case "table.get": this.pop("i32"); this.push(t); return;
          case "table.set": this.pop(t); this.pop("i32"); return;
          case "table.size": this.push("i32"); return;
          case "table.grow": this.pop("i32"); this.pop(t); this.push("i32"); return;
          case "table.fill": this.pop("i32"); this.pop(t); this.pop("i32"); return;
        }
        return;
      }

      case "table_copy": {
        const dst = this.table(instr.dstTable);
        const src = this.table(instr.srcTable);
        if (dst.elemType !== src.elemType) this.fail("type mismatch", instr);
        this.popAll(["i32", "i32", "i32"]);
        return;
      }

      case "table_init": {
        const table = this.table(instr.tableIndex);
        if (this.elem(instr.elemIndex) !== table.elemType) this.fail("type mismatch", instr);
        this.popAll(["i32", "i32", "i32"]);
        return;
      }

      case "elem_drop":
        this.elem(instr.elemIndex);
        return;

      case "memory": {
        this.memory(0);
        const info = opcodeByName(instr.op);
        if (!info?.signature) return this.fail(`unknown memory instruction ${instr.op}`, instr);
        if (instr.memArg.align > naturalAlignment(info)) {
          this.fail("alignment must not be larger than natural", instr);
        }
        this.popAll(info.signature.params);
        this.pushAll(info.signature.results);
        return;
      }

      case "memory_size":
        this.memory(instr.memIndex);
        if (instr.op === "memory.grow") this.pop("i32");
        this.push("i32");
        return;

      case "memory_init":
        this.memory(instr.memIndex);
        this.data(instr.dataIndex);
        this.popAll(["i32", "i32", "i32"]);
        return;

      case "data_drop":
        this.data(instr.dataIndex);
        return;

      case "memory_copy":
        this.memory(instr.dstMem);
        this.memory(instr.srcMem);
        this.popAll(["i32", "i32", "i32"]);
        return;

      case "memory_fill":
        this.memory(instr.memIndex);
        this.popAll(["i32", "i32", "i32"]);
        return;

      case "const":
        this.push(instr.type);
        return;

      case "numeric": {
        const info = opcodeByName(instr.op);
        if (!info?.signature) return this.fail(`unknown numeric instruction ${instr.op}`, instr);
        this.popAll(info.signature.params);
        this.pushAll(info.signature.results);
        return;
      }

      case "ref_null":
        this.push(instr.type);
        return;

      case "ref_is_null": {
        const t = this.popAny();
        if (!isRef(t) && t !== "unknown") this.fail("type mismatch", instr);
        this.push("i32");
        return;
      }

      case "ref_func":
        this.funcType(instr.funcIndex);
        if (!this.ctx.refs.has(instr.funcIndex)) this.fail("undeclared function reference", instr);
        this.push("funcref");
        return;
    }
  }
}

function typesMatch(a: readonly ValueType[], b: readonly ValueType[]): boolean {
  return a.length === b.length && a.every((t, i) => t === b[i]);
}

/**
 * Module validator. Collects at most one error per function plus any
 * module-level errors; a module is usable only when none were found.
 */
export class Validator {
  private errors: ValidationError[] = [];

  validate(module: Module): { validated?: ValidatedModule; errors: ValidationError[] } {
    this.errors = [];
    const ctx: ModuleContext = {
      module,
      globals: globalTypes(module),
      tables: tableTypes(module),
      memoryCount: memoryTypes(module).length,
      funcCount: module.imports.filter(i => i.desc.kind === "func").length + module.functions.length,
      refs: new Set(),
    };

    this.checkTypesAndImports(module);
    this.collectRefs(module, ctx);
    this.checkTablesAndMemories(ctx);
    this.checkGlobals(module, ctx);
    this.checkExports(module, ctx);
    this.checkStart(module);
    this.checkSegments(module, ctx);

    const imported = ctx.funcCount - module.functions.length;
    const functions: FunctionMetadata[] = [];
    module.functions.forEach((body, i) => {
      const funcIndex = imported + i;
      const type = module.types[body.typeIndex];
      if (type === undefined) {
        this.errors.push(new ValidationError("unknown type", body.offset, funcIndex));
        return;
      }
      this.guard(() => functions.push(new FunctionValidator(ctx, body, funcIndex, type).run()));
    });

    if (this.errors.length > 0) return { errors: this.errors };
    return { validated: { module, functions }, errors: [] };
  }

  private guard(check: () => void): void {
    try {
      check();
    } catch (e) {
      if (!(e instanceof ValidationError)) throw e;
      this.errors.push(e);
    }
  }

  private report(reason: string, offset = 0): void {
    this.errors.push(new ValidationError(reason, offset));
  }

  private checkTypesAndImports(module: Module): void {
    for (const imp of module.imports) {
      if (imp.desc.kind === "func" && module.types[imp.desc.typeIndex] === undefined) this.report("unknown type");
      if (imp.desc.kind === "table") this.checkLimits(imp.desc.type.limits, MAX_TABLE_SIZE, "table size must be at most 2^32-1");
      if (imp.desc.kind === "memory") this.checkLimits(imp.desc.type.limits, MAX_MEMORY_PAGES, "memory size must be at most 65536 pages (4GiB)");
    }
  }

  private collectRefs(module: Module, ctx: ModuleContext): void {
    const collect = (expr: ConstExpr) => {
      for (const instr of expr) if (instr.kind === "ref_func") ctx.refs.add(instr.funcIndex);
    };
    for (const seg of module.elements) seg.init.forEach(collect);
    for (const g of module.globals) collect(g.init);
    for (const e of module.exports) if (e.kind === "func") ctx.refs.add(e.index);
  }

  private checkLimits(limits: Limits, bound: number, message: string): void {
    if (limits.min > bound || (limits.max !== undefined && limits.max > bound)) this.report(message);
    if (limits.max !== undefined && limits.min > limits.max) this.report("size minimum must not be greater than maximum");
  }

  private checkTablesAndMemories(ctx: ModuleContext): void {
    for (const table of ctx.module.tables) this.checkLimits(table.limits, MAX_TABLE_SIZE, "table size must be at most 2^32-1");
    for (const memory of ctx.module.memories) {
      this.checkLimits(memory.limits, MAX_MEMORY_PAGES, "memory size must be at most 65536 pages (4GiB)");
    }
    if (ctx.memoryCount > 1) this.report("multiple memories");
  }

  /**
   * Constant expressions: one `*.const`, `ref.null`, `ref.func`, or `global.get`
   * of an imported immutable global, producing exactly `expected`.
   */
  private checkConstExpr(expr: ConstExpr, expected: ValueType, ctx: ModuleContext, importedGlobals: number): void {
    const offset = expr[0]?.offset ?? 0;
    if (expr.length !== 1) {
      this.report(expr.length === 0 ? "type mismatch" : "constant expression required", offset);
      return;
    }
    const instr = expr[0];
    let actual: ValueType;
    switch (instr.kind) {
      case "const": actual = instr.type; break;
      case "ref_null": actual = instr.type; break;
      case "ref_func":
        if (instr.funcIndex >= ctx.funcCount) {
          this.report("unknown function", offset);
          return;
        }
        actual = "funcref";
        break;
      case "variable": {
        if (instr.op !== "global.get") {
          this.report("constant expression required", offset);
          return;
        }
        const g = ctx.globals[instr.index];
        if (g === undefined || instr.index >= importedGlobals) {
          this.report("unknown global", offset);
          return;
        }
        if (g.mutable) {
          this.report("constant expression required", offset);
          return;
        }
        actual = g.valueType;
        break;
      }
      default:
        this.report("constant expression required", offset);
        return;
    }
    if (actual !== expected) this.report("type mismatch", offset);
  }

  private checkGlobals(module: Module, ctx: ModuleContext): void {
    const imported = module.imports.filter(i => i.desc.kind === "global").length;
    for (const g of module.globals) this.checkConstExpr(g.init, g.type.valueType, ctx, imported);
  }

  private checkExports(module: Module, ctx: ModuleContext): void {
    const seen = new Set<string>();
    for (const e of module.exports) {
      if (seen.has(e.name)) this.report("duplicate export name");
      seen.add(e.name);
      const bound = e.kind === "func" ? ctx.funcCount
        : e.kind === "table" ? ctx.tables.length
        : e.kind === "memory" ? ctx.memoryCount
        : ctx.globals.length;
      if (e.index >= bound) this.report(`unknown ${e.kind === "func" ? "function" : e.kind}`);
    }
  }

  private checkStart(module: Module): void {
    if (module.start === undefined) return;
    const type = funcTypeOf(module, module.start);
    if (type === undefined) {
      this.report("unknown function");
    } else if (type.params.length > 0 || type.results.length > 0) {
      this.report("start function");
    }
  }

  private checkSegments(module: Module, ctx: ModuleContext): void {
    const importedGlobals = module.imports.filter(i => i.desc.kind === "global").length;
    for (const seg of module.elements) {
      if (seg.mode.kind === "active") {
        const table = ctx.tables[seg.mode.index];
        if (table === undefined) {
          this.report("unknown table");
        } else if (table.elemType !== seg.type) {
          this.report("type mismatch");
        }
        this.checkConstExpr(seg.mode.offset, "i32", ctx, importedGlobals);
      }
      for (const item of seg.init) this.checkConstExpr(item, seg.type, ctx, importedGlobals);
    }
    for (const seg of module.datas) {
      if (seg.mode.kind !== "active") continue;
      if (seg.mode.index >= ctx.memoryCount) this.report(`unknown memory ${seg.mode.index}`);
      this.checkConstExpr(seg.mode.offset, "i32", ctx, importedGlobals);
    }
  }
}

/** Validate a module, throwing the first {@link ValidationError} found. */
export function validateModule(module: Module): ValidatedModule {
  const { validated, errors } = new Validator().validate(module);
  if (!validated) throw errors[0];
  return validated;
}
