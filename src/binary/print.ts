import type { BlockType, Instruction } from "./module.js";

/** Mnemonic of an instruction as it appears in the text format. */
export function instructionName(instr: Instruction): string {
  switch (instr.kind) {
    case "control":
    case "block":
    case "br":
    case "variable":
    case "table":
    case "memory":
    case "memory_size":
    case "numeric":
      return instr.op;
    case "parametric":
      return instr.op;
    case "br_table": return "br_table";
    case "call": return "call";
    case "call_indirect": return "call_indirect";
    case "table_copy": return "table.copy";
    case "table_init": return "table.init";
    case "elem_drop": return "elem.drop";
    case "memory_init": return "memory.init";
    case "data_drop": return "data.drop";
    case "memory_copy": return "memory.copy";
    case "memory_fill": return "memory.fill";
    case "const": return `${instr.type}.const`;
    case "ref_null": return "ref.null";
    case "ref_is_null": return "ref.is_null";
    case "ref_func": return "ref.func";
  }
}

function blockTypeText(blockType: BlockType): string {
  switch (blockType.kind) {
    case "empty": return "";
    case "value": return ` (result ${blockType.type})`;
    case "index": return ` (type ${blockType.typeIndex})`;
  }
}

function floatText(value: number): string {
  if (Number.isNaN(value)) return "nan";
  if (value === Infinity) return "inf";
  if (value === -Infinity) return "-inf";
  if (Object.is(value, -0)) return "-0";
  return String(value);
}

/** One-line text rendering, e.g. `i32.load offset=4 align=2`. */
export function formatInstruction(instr: Instruction): string {
  const name = instructionName(instr);
  switch (instr.kind) {
    case "block": return `${name}${blockTypeText(instr.blockType)}`;
    case "br": return `${name} ${instr.depth}`;
    case "br_table": return `${name} ${[...instr.depths, instr.defaultDepth].join(" ")}`;
    case "call": return `${name} ${instr.funcIndex}`;
    case "call_indirect": return `${name} ${instr.tableIndex} (type ${instr.typeIndex})`;
    case "parametric":
      return instr.types ? `${name} (result ${instr.types.join(" ")})` : name;
    case "variable": return `${name} ${instr.index}`;
    case "table": return `${name} ${instr.tableIndex}`;
    case "table_copy": return `${name} ${instr.dstTable} ${instr.srcTable}`;
    case "table_init": return `${name} ${instr.tableIndex} ${instr.elemIndex}`;
    case "elem_drop": return `${name} ${instr.elemIndex}`;
    case "memory": {
      const parts = [name];
      if (instr.memArg.offset !== 0) parts.push(`offset=${instr.memArg.offset}`);
      parts.push(`align=${2 ** instr.memArg.align}`);
      return parts.join(" ");
    }
    case "memory_init": return `${name} ${instr.dataIndex}`;
    case "data_drop": return `${name} ${instr.dataIndex}`;
    case "const":
      return instr.type === "f32" || instr.type === "f64"
        ? `${name} ${floatText(instr.value)}`
        : `${name} ${instr.value}`;
    case "ref_null": return `${name} ${instr.type === "funcref" ? "func" : "extern"}`;
    case "ref_func": return `${name} ${instr.funcIndex}`;
    default:
      return name;
  }
}
