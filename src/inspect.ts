import { funcTypeToString, functionName, importedCount, type Module } from "./binary/module.js";

export interface FunctionSummary {
  index: number;
  name: string;
  type: string;
  /** Absent for imported functions. */
  locals?: number;
  instructions?: number;
  imported?: string;
}

export interface ModuleSummary {
  types: string[];
  imports: { module: string; name: string; kind: string }[];
  functions: FunctionSummary[];
  tables: string[];
  memories: string[];
  globals: string[];
  exports: { name: string; kind: string; index: number }[];
  start?: number;
  elements: number;
  datas: number;
  customs: string[];
}

function limits(min: number, max: number | undefined): string {
  return max === undefined ? `${min}..` : `${min}..${max}`;
}

/** Structural summary of a decoded module, as printed by `wasmscope inspect`. */
export function summarizeModule(module: Module): ModuleSummary {
  const functions: FunctionSummary[] = [];
  let index = 0;
  for (const imp of module.imports) {
    if (imp.desc.kind !== "func") continue;
    const type = module.types[imp.desc.typeIndex];
    functions.push({
      index,
      name: functionName(module, index),
      type: type ? funcTypeToString(type) : "?",
      imported: `${imp.module}.${imp.name}`,
    });
    index++;
  }
  const imported = importedCount(module, "func");
  module.functions.forEach((body, i) => {
    const type = module.types[body.typeIndex];
    functions.push({
      index: imported + i,
      name: functionName(module, imported + i),
      type: type ? funcTypeToString(type) : "?",
      locals: body.locals.length,
      instructions: body.body.length,
    });
  });

  return {
    types: module.types.map(funcTypeToString),
    imports: module.imports.map(i => ({ module: i.module, name: i.name, kind: i.desc.kind })),
    functions,
    tables: module.tables.map(t => `${t.elemType} ${limits(t.limits.min, t.limits.max)}`),
    memories: module.memories.map(m => `pages ${limits(m.limits.min, m.limits.max)}`),
    globals: module.globals.map(g => `${g.type.mutable ? "mut " : ""}${g.type.valueType}`),
    exports: module.exports.map(e => ({ name: e.name, kind: e.kind, index: e.index })),
    start: module.start,
    elements: module.elements.length,
    datas: module.datas.length,
    customs: module.customs.map(c => c.name),
  };
}

export function formatSummary(summary: ModuleSummary): string[] {
  const lines: string[] = [];
  const section = (title: string, items: string[]) => {
    if (items.length === 0) return;
    lines.push(`${title} (${items.length}):`);
    for (const item of items) lines.push(`  ${item}`);
  };
  section("types", summary.types.map((t, i) => `${i}: ${t}`));
  section("imports", summary.imports.map(i => `${i.module}.${i.name} (${i.kind})`));
  section("functions", summary.functions.map(f =>
    f.imported !== undefined
      ? `${f.index}: ${f.name} ${f.type} imported from ${f.imported}`
      : `${f.index}: ${f.name} ${f.type}, ${f.locals} locals, ${f.instructions} instructions`,
  ));
  section("tables", summary.tables);
  section("memories", summary.memories);
  section("globals", summary.globals.map((g, i) => `${i}: ${g}`));
  section("exports", summary.exports.map(e => `${e.name} -> ${e.kind} ${e.index}`));
  if (summary.start !== undefined) lines.push(`start: ${summary.start}`);
  if (summary.elements > 0) lines.push(`element segments: ${summary.elements}`);
  if (summary.datas > 0) lines.push(`data segments: ${summary.datas}`);
  section("custom sections", summary.customs);
  return lines;
}
